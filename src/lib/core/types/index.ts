export * from './document.types';
export * from './comparison.types';
