export const name = '@roster/repo';

export * from './scanner';
export { DEFAULT_SCAN_CONCURRENCY } from './scanner/utils';
export * from './cache/repo-set';
export * from './cache/store';
export * from './git';
export { FakeBackend, type FakeRepository } from './git/fake';
export * from './handle/status-code';
export * from './handle/repository-handle';
export * from './report/types';
export * from './report/columns';
export * from './report/builder';
