export type { BackendAdapter, BackendKind, ObjectHandle, PropertyValue } from './types.js';
export { childPath, handleForPath, isObjectHandle } from './types.js';
