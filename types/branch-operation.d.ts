/** Operation performed by the branch command. */
export type BranchOperation = 'checkout' | 'create' | 'delete' | 'list' | 'push'
