// Common types used across the protocol

/**
 * Identifier generated by the store for an inserted document
 */
export type Id = string;

/**
 * Run identifier chosen by the acquisition system (string or number)
 */
export type ScanId = string | number;

/**
 * Free-form mapping persisted as-is (custom fields, data points, parameters)
 */
export type DocumentMap = Record<string, unknown>;
