import { logger } from '../logger.js';
import { DEFAULT_POLICY } from '../policy/inclusion-policy.js';
import type { InclusionPolicy } from '../policy/inclusion-policy.js';
import type { Package } from '../types.js';
import { parseImageReference } from './dockerfile-parser.js';
import { PackageCollector } from './package-builder.js';
import type { SourceFile } from './source-file.js';
import { parseYamlDocument, yamlMapEntries, yamlNodeLine, yamlScalarValue } from './structured.js';

/**
 * Images named by `services.<name>.image`. Services built from a local
 * context are logged and skipped; the Dockerfile they point to is picked up
 * by discovery on its own when it lives inside the scanned tree.
 */
export function parseComposeFile(file: SourceFile, policy: InclusionPolicy = DEFAULT_POLICY): Package[] {
  const doc = parseYamlDocument(file);
  const collector = new PackageCollector(policy, 'image');

  for (const { key: service, value: config } of yamlMapEntries(doc.get('services', true))) {
    for (const { key, keyNode, value } of yamlMapEntries(config)) {
      if (key === 'build') {
        logger.debug(`Build context of service ${service} is not resolved`, { file: file.path });
        continue;
      }
      if (key !== 'image') continue;

      const image = yamlScalarValue(value);
      if (typeof image !== 'string') continue;

      const reference = parseImageReference(image);
      if (!reference) continue;

      collector.add({
        ...reference,
        ecosystem: 'docker',
        location: file.location(yamlNodeLine(file, keyNode), `services.${service}.image: ${image}`, 'docker-compose'),
      });
    }
  }

  return collector.packages;
}
