export * from './charset.js';
export * from './distance.js';
export * from './encoding.js';
export * from './errors.js';
export * from './frequency.js';
export * from './repeatingKey.js';
export * from './singleByteXor.js';
export * from './xor.js';
