export { KeyedMutex } from './keyed-mutex';
export { DocumentWriteGuard, type ConsistencyCheck } from './write-guard';
