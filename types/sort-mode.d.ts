/** Ordering applied to listed tags. */
export type SortMode = 'alphabetic' | 'version' | 'date'
