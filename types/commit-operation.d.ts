/** Operation performed by the commit command. */
export type CommitOperation = 'create' | 'amend' | 'list'
