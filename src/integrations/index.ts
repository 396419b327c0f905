export * from './command';
export * from './docker-builder';
export * from './docker-sandbox';
export * from './http-coverage-sink';
