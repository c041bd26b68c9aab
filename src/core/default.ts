import { configFromEnv } from '../config/config.js';
import type { ValidationError } from '../error/validationError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { PubChemClient } from './client.js';
import type { CompoundRecord, PropertyRow, SynonymEntry } from './schemas.js';

let defaultClient: PubChemClient | null = null;

/**
 * Process-wide client, created from the environment ({@link configFromEnv}) on
 * first use. Once created it is never replaced.
 */
export function getDefaultClient(): SafeWrap<ValidationError, PubChemClient> {
  if (defaultClient) {
    return [null, defaultClient];
  }

  const [err, config] = configFromEnv();
  if (err) {
    return [err, null];
  }

  defaultClient = new PubChemClient(config);
  return [null, defaultClient];
}

/**
 * Install `client` as the process-wide client. Only works before the default
 * client was first used; returns whether it was installed.
 */
export function setDefaultClient(client: PubChemClient): boolean {
  if (defaultClient) {
    return false;
  }
  defaultClient = client;
  return true;
}

/** {@link PubChemClient.compounds} on the default client. */
export async function getCompounds(
  ...args: Parameters<PubChemClient['compounds']>
): SafeWrapAsync<Error, CompoundRecord[]> {
  const [err, client] = getDefaultClient();
  return err ? [err, null] : client.compounds(...args);
}

/** {@link PubChemClient.properties} on the default client. */
export async function getProperties(
  ...args: Parameters<PubChemClient['properties']>
): SafeWrapAsync<Error, PropertyRow[]> {
  const [err, client] = getDefaultClient();
  return err ? [err, null] : client.properties(...args);
}

/** {@link PubChemClient.synonyms} on the default client. */
export async function getSynonyms(
  ...args: Parameters<PubChemClient['synonyms']>
): SafeWrapAsync<Error, SynonymEntry[]> {
  const [err, client] = getDefaultClient();
  return err ? [err, null] : client.synonyms(...args);
}

/** {@link PubChemClient.cids} on the default client. */
export async function getCids(...args: Parameters<PubChemClient['cids']>): SafeWrapAsync<Error, number[]> {
  const [err, client] = getDefaultClient();
  return err ? [err, null] : client.cids(...args);
}

/** {@link PubChemClient.sources} on the default client. */
export async function getAllSources(...args: Parameters<PubChemClient['sources']>): SafeWrapAsync<Error, string[]> {
  const [err, client] = getDefaultClient();
  return err ? [err, null] : client.sources(...args);
}
