/**
 * Public utility exports
 * @packageDocumentation
 */

export { errors } from './errors.js';
export { validation } from './validation.js';
