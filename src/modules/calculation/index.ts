export * from './navigation-engine';
export * from './great-circle.engine';
export * from './route-calculation.worker';
export * from './engine-thread.protocol';
export * from './threaded.engine';
