import {EitherAsync} from 'purify-ts';

/**
 * Run post-commit side effects concurrently and wait for all of them. The
 * state change they follow is already committed, so a failure is logged and
 * reported back but never undoes or fails the operation.
 *
 * @return the failure messages, empty when every follow-up succeeded
 */
export async function performFollowUps(
  label: string,
  followUps: Array<() => Promise<void>>
): Promise<string[]> {
  const results = await Promise.all(followUps.map(f => EitherAsync(f).run()));
  const failures = results
    .filter(result => result.isLeft())
    .map(result => {
      const error = result.extract();
      return error instanceof Error ? error.message : String(error);
    });
  failures.forEach(message => console.warn(`⚠️  ${label} follow-up failed: ${message}`));
  return failures;
}
