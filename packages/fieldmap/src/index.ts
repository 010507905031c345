/**
 * fieldmap - declarative, bidirectional data mapping.
 *
 * Re-exports every @fieldmap package. Import from the individual packages
 * to depend on less.
 *
 * @example
 * import { Mapping, field, marshal, serialize } from 'fieldmap';
 *
 * const UserMapping = new Mapping([field('name').string(), field('id').integer()]);
 * const user = marshal(UserMapping, { name: 'foo', id: 1 });
 */

// Mapping core
export * from '@fieldmap/mapping';

// Field implementations
export * from '@fieldmap/fields';

// Validation (TypeBox wrappers)
export * from '@fieldmap/validation';

// Logging
export * from '@fieldmap/logging';

// Configuration
export * from '@fieldmap/config';

export { configureLogging } from './configure-logging';
