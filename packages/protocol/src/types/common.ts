// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Stable entity identifier, "<kind>:<n>". Never reused within a game.
 */
export type Id = string;

/**
 * Value of a single entity attribute.
 * Kept flat so partial updates can be expressed as field/value pairs.
 */
export type AttributeValue = string | number | boolean | null;

/**
 * Flat attribute bag
 */
export type Attributes = Record<string, AttributeValue>;
