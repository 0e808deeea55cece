/**
 * A build was cancelled through its AbortSignal. The manifest was not
 * written, so the next build sees the state before this one.
 */
export class BuildAbortedError extends Error {
  override name = 'BuildAbortedError' as const;

  constructor(
    /** Units rendered before the build stopped. */
    public readonly renderedUnits: readonly string[],
  ) {
    super(`Build aborted after rendering ${renderedUnits.length} unit(s); manifest not updated`);
  }
}
