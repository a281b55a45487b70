export { loadPolicy, validatePolicy, readPolicySource, toPolicyDocument, type PolicySource } from './loader.js';
export { PolicyStore, type PolicyCheck, type PolicyListener, type PolicyStoreOptions } from './store.js';
