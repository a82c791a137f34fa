// Shared
export * from './constants';
export * from './result';
export * from './errors';

// Configuration
export * from './config';

// Taxonomy & categorization
export * from './taxonomy';
export * from './categorizer';

// Summaries & filenames
export * from './summary';
export * from './naming';

// Extractors
export * from './extractors';

// Agents
export * from './agents';

// Database
export * from './db';

// Pipeline
export * from './pipeline';
