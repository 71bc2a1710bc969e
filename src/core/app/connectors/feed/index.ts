export * from './decoder';
export * from './packet';
export * from './stream';
