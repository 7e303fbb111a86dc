// Configuration
export * from './config/constants';
export * from './config/settings';

// Errors
export * from './errors';

// Contracts
export * from './contracts';

// Taxonomy
export * from './taxonomy';

// Naming styles
export * from './naming';

// Path builder
export * from './path';

// Database
export * from './db';

// Extractors
export * from './extractors';

// Agents
export * from './agents';

// Output
export * from './output';
