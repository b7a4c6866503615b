export * from './types';
export * from './constants';
export * from './vec';
export * from './directions';
export * from './rng';
export * from './json';
