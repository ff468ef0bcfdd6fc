export * from './physiology';
export * from './protocols';
export * from './zones';
