/**
 * A value read from disk plus the number of malformed records skipped on the way.
 */
export interface Loaded<T> {
    value: T;
    skipped: number;
}
