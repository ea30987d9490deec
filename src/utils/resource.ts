/**
 * Scoped resource helper
 */

/**
 * Run body with a resource that is always released
 *
 * When body fails, its error is reported and a release failure goes to
 * onReleaseError. When body succeeds and release fails, the release failure
 * becomes the result.
 *
 * @param resource - Acquired resource
 * @param release - Releases the resource
 * @param body - Work to do with the resource
 * @param wrapReleaseError - Maps a release failure to the reported error
 * @param onReleaseError - Called with release failures that are not reported
 */
export async function withResource<R, T>(
  resource: R,
  release: (resource: R) => Promise<void>,
  body: (resource: R) => Promise<T>,
  wrapReleaseError: (error: unknown) => Error,
  onReleaseError: (error: unknown) => void = () => {},
): Promise<T> {
  let result: T;
  try {
    result = await body(resource);
  } catch (error) {
    try {
      await release(resource);
    } catch (releaseError) {
      onReleaseError(releaseError);
    }
    throw error;
  }

  try {
    await release(resource);
  } catch (releaseError) {
    throw wrapReleaseError(releaseError);
  }
  return result;
}
