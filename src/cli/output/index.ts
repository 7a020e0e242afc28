export * from './terminal';
export * from './json';
