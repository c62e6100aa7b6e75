import { describe, it, expect } from 'vitest';
import { ParsingError } from '../../src/errors.js';
import { parseComposeFile } from '../../src/parser/compose-parser.js';
import { sourceFile } from '../helpers.js';

describe('parseComposeFile', () => {
  it('should report literal service images', () => {
    const file = sourceFile(
      'docker-compose.yml',
      'services:',
      '  web:',
      '    image: nginx:1.25',
      '    ports:',
      '      - "80:80"',
      '  api:',
      '    build: ./api',
      '  db:',
      '    image: postgres:15.3',
      '  cache:',
      '    image: redis:${REDIS_TAG}',
    );
    const packages = parseComposeFile(file);

    expect(packages.map(pkg => [pkg.name, pkg.version, pkg.ecosystem, pkg.sourceLocations[0]?.lineNumber])).toEqual([
      ['nginx', '1.25', 'docker', 3],
      ['postgres', '15.3', 'docker', 9],
    ]);
    expect(packages[0]?.sourceLocations[0]).toMatchObject({
      declaration: 'services.web.image: nginx:1.25',
      fileType: 'docker-compose',
    });
  });

  it('should keep images whose registry or path contains a dev indicator', () => {
    const file = sourceFile(
      'compose.yaml',
      'services:',
      '  runner:',
      '    image: ghcr.io/acme/test-runner:2.1',
      '  shell:',
      '    image: busybox:1.36',
    );

    expect(parseComposeFile(file).map(pkg => [pkg.name, pkg.version])).toEqual([['ghcr.io/acme/test-runner', '2.1']]);
  });

  it('should return nothing without a services map', () => {
    expect(parseComposeFile(sourceFile('compose.yaml', 'version: "3.8"'))).toEqual([]);
  });

  it('should raise a ParsingError for invalid YAML', () => {
    expect(() => parseComposeFile(sourceFile('compose.yaml', 'services:', '  web: [unclosed'))).toThrow(ParsingError);
  });
});
