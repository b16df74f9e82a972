/**
 * Identifier of a reference or incoming record.
 */
export type RecordId = string

/**
 * Name and address fields that make up a customer/entity record.
 * Every field is optional; absent values are skipped when the
 * record's text representation is built.
 */
export interface RecordFields {
  name?: string | null
  addressLine1?: string | null
  addressLine2?: string | null
  city?: string | null
  state?: string | null
  postalCode?: string | null
  country?: string | null
}

/**
 * An authoritative, known-good record that incoming records are compared against.
 * Reference records are bulk-loaded and never edited.
 */
export interface ReferenceRecord extends RecordFields {
  /** Unique, immutable identifier */
  id: RecordId
  /** Origin feed of the reference data, when known */
  sourceSystem?: string
  /** Concatenated text representation derived from the name/address fields */
  representation: string
}

/**
 * A record submitted by a source system and awaiting classification.
 */
export interface IncomingRecord extends RecordFields {
  /** Unique identifier, preserved across edits */
  id: RecordId
  /** Free-form label of the feed the record came from */
  sourceSystem: string
  /** Concatenated text representation derived from the name/address fields */
  representation: string
}

/**
 * Number of records held on each side of the comparison.
 */
export interface RecordTotals {
  references: number
  incoming: number
}

/**
 * Input accepted when bulk-loading reference records.
 */
export interface ReferenceRecordInput extends RecordFields {
  id: RecordId
  sourceSystem?: string
}

/**
 * Input accepted when creating or editing an incoming record.
 * Omitting `id` creates a new record with a generated identifier.
 */
export interface IncomingRecordInput extends RecordFields {
  id?: RecordId
  sourceSystem: string
}
