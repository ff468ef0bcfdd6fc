export * from './threshold';
export * from './balance';
