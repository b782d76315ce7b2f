export * from './common';
export * from './fragment';
