export { RegistrarRuntimeError } from './RegistrarRuntimeError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, RegistrarErrorCode, Severity } from './types.js';
