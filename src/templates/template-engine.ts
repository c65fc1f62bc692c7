import { stringify } from 'yaml';
import { ApplyError } from '../orchestration/errors';
import type { KubernetesManifest } from './types';

export interface RenderOptions {
  validate?: boolean;
}

const NAME_PATTERN = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;

/**
 * Turns manifest objects into the multi-document YAML that `kubectl apply -f -`
 * reads from stdin.
 */
export class TemplateEngine {
  render(manifests: KubernetesManifest[], options: RenderOptions = { validate: true }): string {
    if (manifests.length === 0) {
      throw new ApplyError('Nothing to render: no manifests given');
    }

    if (options.validate ?? true) {
      manifests.forEach(manifest => this.validateManifest(manifest));
    }

    return manifests.map(manifest => stringify(manifest, { lineWidth: 0 })).join('---\n');
  }

  validateManifest(manifest: KubernetesManifest): boolean {
    const label = `${manifest.kind || 'manifest'}/${manifest.metadata.name || '?'}`;
    if (!manifest.apiVersion) {
      throw new ApplyError(`${label} is missing apiVersion`);
    }
    if (!manifest.kind) {
      throw new ApplyError(`${label} is missing kind`);
    }
    if (!NAME_PATTERN.test(manifest.metadata.name)) {
      throw new ApplyError(`${label} has an invalid name; use lowercase letters, digits, "-" and "."`);
    }
    if (manifest.kind === 'Service') {
      const ports = manifest.spec?.ports;
      if (!Array.isArray(ports) || ports.length === 0) {
        throw new ApplyError(`${label} must declare at least one port`);
      }
    }
    return true;
  }
}
