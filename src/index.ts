export * from './types';
export * from './utils/errors';
export * from './utils/bezier';
export * from './utils/parameters';
export * from './utils/contourWalker';
export * from './utils/collision';
export * from './utils/simulation';
export * from './utils/pathCommands';
export * from './utils/containment';
export * from './utils/renderLayers';
