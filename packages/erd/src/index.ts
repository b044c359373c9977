export * from './content';
export * from './schema-graph';
