export { TaskPool } from './task-pool.js';
export { KeyedMutex } from './keyed-mutex.js';
export { sleep, throwIfAborted, raceAbort, isAbortError } from './abort.js';
