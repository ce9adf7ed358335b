/** Operation performed by the tag command. */
export type TagOperation = 'create' | 'delete' | 'check' | 'list' | 'push'
