import type { ProjectDefinition } from '../types.js';

/**
 * Published manifest, keyed the way the definition file is
 */
export interface Manifest {
  id: string;
  version: string;
  repo_url?: string;
  dependencies?: string[];
}

export function buildManifest(definition: ProjectDefinition): Manifest {
  const manifest: Manifest = {
    id: definition.id ?? definition.name ?? '',
    version: definition.version ?? '',
  };
  if (definition.repoUrl) {
    manifest.repo_url = definition.repoUrl;
  }
  if (definition.codebase.dependencies && definition.codebase.dependencies.length > 0) {
    manifest.dependencies = [...definition.codebase.dependencies];
  }
  return manifest;
}

/**
 * Render the manifest as indented JSON
 */
export function generateManifest(definition: ProjectDefinition): string {
  return JSON.stringify(buildManifest(definition), null, 2);
}
