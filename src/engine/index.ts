export * from './collaborators';
export * from './concurrency-controller';
export * from './coverage-aggregator';
export * from './job-executor';
export * from './matrix-expander';
export * from './orchestrator';
export * from './state-machine';
export * from './trigger-policy';
