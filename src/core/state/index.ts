export { computeStateLocation, backendDocument, lockId, LOCK_SUFFIX, type StateLocation } from './layout.js';
