export { sha256, canonicalJson, hashObject } from './hasher.js';
