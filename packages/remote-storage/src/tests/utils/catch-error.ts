/** Run `fn` and return what it threw, or `undefined`. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  return undefined
}
