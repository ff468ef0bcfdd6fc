export * from './errors';
export * from './regression';
export * from './threshold';
export * from './zones';
export * from './predictions';
