export * from './paths';
export * from './file-state-store';
