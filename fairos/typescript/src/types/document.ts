/**
 * Document database types.
 */

export type FieldType = 'str' | 'number' | 'map';

/** An indexed field and its type. */
export type FieldDefinition = readonly [name: string, type: FieldType];

export interface DocumentDatabase {
  name: string;
  /** Indexed fields, sorted by name. */
  fields: Array<[string, FieldType]>;
}
