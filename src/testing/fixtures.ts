/**
 * On-disk catalog fixtures shared by the tests, and an in-process
 * stand-in for the GitHub contents API.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { Octokit } from '@octokit/rest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

export const OWL_CLASS_QUERY = `SELECT ?class WHERE {
  ?class a <http://www.w3.org/2002/07/owl#Class> .
} ORDER BY ?class`;

export function ontologyTurtle(namespace: string, classes: readonly string[]): string {
  const lines = [
    `@prefix ex: <${namespace}> .`,
    '@prefix owl: <http://www.w3.org/2002/07/owl#> .',
    '',
    ...classes.map(name => `ex:${name} a owl:Class .`),
  ];
  return lines.join('\n') + '\n';
}

export interface ModelFixture {
  id: string;
  /** File name of the ontology (default: ontology.ttl) */
  ontologyFile?: string;
  ontology?: string;
  /** metadata.yaml content; omitted means no metadata file */
  metadata?: string;
  metadataGraph?: string;
}

/**
 * The three models most catalog tests use:
 * - alpha: en, keywords safety and transport, Research
 * - beta: en, keyword health, Industry
 * - gamma: pt, keyword safety, Classroom
 */
export const STANDARD_MODELS: readonly ModelFixture[] = [
  {
    id: 'alpha',
    ontology: ontologyTurtle('http://example.org/alpha#', ['Vehicle', 'Driver']),
    metadata: [
      'title: Alpha Transport Ontology',
      'acronym: ATO',
      'keyword: [safety, transport]',
      'language: en',
      'context: [Research]',
      'designedForTask: [ConceptualClarification, Interoperability]',
      'representationStyle: ontouml',
      'ontologyType: Domain',
    ].join('\n'),
  },
  {
    id: 'beta',
    ontology: ontologyTurtle('http://example.org/beta#', ['Patient']),
    metadata: [
      'title: Beta Health Model',
      'keyword: health',
      'language: en',
      'context: Industry',
    ].join('\n'),
  },
  {
    id: 'gamma',
    ontology: ontologyTurtle('http://example.org/gamma#', ['Hazard', 'Vehicle']),
    metadata: [
      'title: Gamma Safety Model',
      'keyword: [safety]',
      'language: pt',
      'context: [Classroom]',
      'representationStyle: UFO',
    ].join('\n'),
  },
];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = join(tmpdir(), `${prefix}-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeModelFolder(modelsDir: string, fixture: ModelFixture): Promise<string> {
  const folder = join(modelsDir, fixture.id);
  await mkdir(folder, { recursive: true });
  if (fixture.ontology !== undefined) {
    await writeFile(join(folder, fixture.ontologyFile ?? 'ontology.ttl'), fixture.ontology);
  }
  if (fixture.metadata !== undefined) {
    await writeFile(join(folder, 'metadata.yaml'), fixture.metadata + '\n');
  }
  if (fixture.metadataGraph !== undefined) {
    await writeFile(join(folder, 'metadata.ttl'), fixture.metadataGraph);
  }
  return folder;
}

/**
 * Write `<root>/models/<id>/...` for every fixture.
 */
export async function writeCatalog(root: string, fixtures: readonly ModelFixture[] = STANDARD_MODELS): Promise<void> {
  const modelsDir = join(root, 'models');
  await mkdir(modelsDir, { recursive: true });
  for (const fixture of fixtures) {
    await writeModelFolder(modelsDir, fixture);
  }
}

/**
 * A contents API entry for a file, base64-encoded the way GitHub returns it.
 */
export function githubFile(path: string, text: string): Record<string, unknown> {
  return {
    type: 'file',
    name: path.slice(path.lastIndexOf('/') + 1),
    path,
    encoding: 'base64',
    content: Buffer.from(text, 'utf-8').toString('base64'),
  };
}

/**
 * Octokit whose requests are answered from `contents`, keyed by decoded
 * URL path; anything else is a 404. Request paths and query strings are
 * appended to `requested`.
 */
export function createFakeOctokit(contents: Record<string, unknown>, requested: string[] = []): Octokit {
  const fakeFetch: typeof fetch = async input => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const path = decodeURIComponent(url.pathname);
    requested.push(`${path}${url.search}`);
    const body = contents[path];
    const headers = { 'content-type': 'application/json; charset=utf-8' };
    if (body === undefined) {
      return new Response(JSON.stringify({ message: 'Not Found' }), { status: 404, headers });
    }
    return new Response(JSON.stringify(body), { status: 200, headers });
  };
  return new Octokit({ request: { fetch: fakeFetch } });
}

/**
 * Contents of a small remote catalog in `acme/ontologies`.
 */
export const REMOTE_CONTENTS: Record<string, unknown> = {
  '/repos/acme/ontologies/contents/models': [
    { type: 'dir', name: 'beta', path: 'models/beta' },
    { type: 'file', name: 'README.md', path: 'models/README.md' },
    { type: 'dir', name: 'alpha', path: 'models/alpha' },
  ],
  '/repos/acme/ontologies/contents/models/alpha': [
    { type: 'file', name: 'ontology.ttl', path: 'models/alpha/ontology.ttl' },
    { type: 'file', name: 'metadata.yaml', path: 'models/alpha/metadata.yaml' },
  ],
  '/repos/acme/ontologies/contents/models/alpha/metadata.yaml': githubFile(
    'models/alpha/metadata.yaml',
    'title: Remote Alpha\nlanguage: en\nkeyword: [safety]\n'
  ),
  '/repos/acme/ontologies/contents/models/beta': [
    { type: 'file', name: 'ontology.ttl', path: 'models/beta/ontology.ttl' },
  ],
};
