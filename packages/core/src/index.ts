// Configuration
export * from './config/constants';

// Errors
export * from './errors';

// Mapping table
export * from './mapping';

// Classifier
export * from './classifier';

// Kits
export * from './kit';

// Filtering
export * from './filter';

// Assignment
export * from './assignment';

// Preset serialization
export * from './preset';

// Sample crawler
export * from './indexer/sample-crawler';

// Listing JSON
export * from './contracts';
export * from './listing';

// Pipeline
export * from './pipeline';
