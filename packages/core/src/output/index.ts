export { OutputFormatter, OutputFormatSchema, OUTPUT_COLUMNS, escapeCsvField, escapeTsvField } from './formatter';
export type { OutputFormat } from './formatter';
