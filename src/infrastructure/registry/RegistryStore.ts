/**
 * Registry Store - The sponsor register loaded for this process
 *
 * The register is a large download, so it is loaded once at startup and
 * shared read-only by every pipeline run.
 */

import type { RegistrySource, SponsorRegistry } from '../../domain/entities/SponsorRegistry.js';
import { RegistryLoadError } from '../../domain/errors/PipelineErrors.js';
import { loadRegistryFrom, type RegistryLoadOptions } from '../../domain/services/RegistryIndex.js';
import type { SponsorRegisterClient } from '../../integrations/registry/SponsorRegisterClient.js';

let registryInstance: SponsorRegistry | null = null;

export async function initializeRegistry(
  source: RegistrySource,
  options: RegistryLoadOptions = {},
  client?: SponsorRegisterClient
): Promise<SponsorRegistry> {
  registryInstance = await loadRegistryFrom(source, options, client);
  return registryInstance;
}

export function getRegistry(): SponsorRegistry {
  if (!registryInstance) {
    throw new RegistryLoadError('Sponsor register has not been loaded');
  }
  return registryInstance;
}

export function isRegistryLoaded(): boolean {
  return registryInstance !== null;
}

export function resetRegistry(): void {
  registryInstance = null;
}
