import { emptyCredential, type ConfigurationOption, type Credential } from './options.js';

/**
 * Applies options left to right to an empty credential.
 *
 * No field is validated here; an empty list yields an all-empty credential.
 * The returned credential is frozen.
 */
export async function resolveCredential(
  options: readonly ConfigurationOption[]
): Promise<Readonly<Credential>> {
  let credential = emptyCredential();
  for (const option of options) {
    credential = await option(credential);
  }
  return Object.freeze({ ...credential });
}
