/** A duration or instant in milliseconds. */
export type Milliseconds = number
