/**
 * Declarative, bidirectional data mapping.
 *
 * @example
 * ```typescript
 * import { Mapping, marshal, serialize } from '@fieldmap/mapping';
 *
 * const mapping = new Mapping([nameField, idField]);
 * const internal = marshal(mapping, payload);
 * const external = serialize(mapping, internal);
 * ```
 */

export { Mapping, isMappedField, type MappingOptions } from './mapping';
export { marshal, serialize, validateForMarshal, validateForSerialize, unwrapOutcomes } from './marshal';
export {
	MappingError,
	FieldValidationError,
	MappingErrors,
	MappingFault,
	BatchMappingErrors,
	flattenErrorMap
} from './mapping-errors';
export { resolveAttribute, isPlainRecord, isEmptyValue, SELF_KEY } from './attribute-resolver';
export { marshalDirection, serializeDirection, writePath, type DirectionStrategy, type OwnedRecords } from './direction';
export { MappingIterator, ValidateOnlyIterator, processField, MAPPING_ERROR_KEY } from './mapping-iterator';
export type {
	MappedField,
	MappingData,
	ErrorMap,
	DirectionName,
	MappingValidator,
	FieldResult,
	MappingOutcome,
	PassOptions,
	BatchPassOptions
} from './types';
