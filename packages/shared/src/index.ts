export * from './style-vocabulary';
export * from './theme-preference';
