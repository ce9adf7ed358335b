/** A tag as known to the listing and ordering functions. */
export interface TagRecord {
  /** Creation date, only filled in when date ordering is requested. */
  creationTimestamp?: Date | null

  /** Subject of the annotation message for annotated tags. */
  annotationMessage?: string | null

  /** Tag name (e.g., 'v1.2.3'). */
  name: string
}
