export * from './engine';
export * from './profiles';
export * from './random';
