/**
 * RemoteCatalogIndex — Read-only view of a catalog hosted on GitHub.
 *
 * Lists the model folders under the models path of a repository and
 * reads their metadata without cloning it.
 */

import { Octokit } from '@octokit/rest';
import { IOError, NotFoundError, describeError } from '../errors.js';
import { METADATA_YAML_FILES, parseMetadata } from '../model/Model.js';
import type { ModelMetadata } from '../model/metadata.js';
import { DEFAULT_MODELS_DIR } from './Catalog.js';

export interface RemoteCatalogConfig {
  owner: string;
  repo: string;
  /** Path of the models directory in the repository (default: 'models') */
  modelsPath?: string;
  /** Branch, tag or commit (default: the repository's default branch) */
  ref?: string;
  token?: string;
}

interface ContentEntry {
  name: string;
  type: string;
}

function httpStatus(err: unknown): number | undefined {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export class RemoteCatalogIndex {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;
  private readonly modelsPath: string;
  private readonly ref: string | undefined;

  /**
   * @param octokit - client to use instead of one built from `config.token`
   */
  constructor(config: RemoteCatalogConfig, octokit?: Octokit) {
    this.octokit = octokit ?? new Octokit(config.token !== undefined ? { auth: config.token } : {});
    this.owner = config.owner;
    this.repo = config.repo;
    this.modelsPath = (config.modelsPath ?? DEFAULT_MODELS_DIR).replace(/^\/+|\/+$/g, '');
    this.ref = config.ref;
  }

  get repository(): string {
    return `${this.owner}/${this.repo}`;
  }

  /**
   * Names of the model folders, sorted.
   */
  async listModelFolders(): Promise<string[]> {
    const entries = await this.listDirectory(this.modelsPath);
    return entries
      .filter(entry => entry.type === 'dir')
      .map(entry => entry.name)
      .sort();
  }

  /**
   * Fetch and map the metadata of one remote model.
   *
   * @throws NotFoundError when the model folder has no metadata file
   */
  async fetchMetadata(modelId: string): Promise<ModelMetadata> {
    const folder = `${this.modelsPath}/${modelId}`;
    const entries = await this.listDirectory(folder);
    const names = entries.filter(entry => entry.type === 'file').map(entry => entry.name);
    const fileName = METADATA_YAML_FILES.find(name => names.includes(name));
    if (fileName === undefined) {
      throw new NotFoundError(`Metadata file not found in ${this.repository}:${folder}.`);
    }

    const path = `${folder}/${fileName}`;
    return parseMetadata(await this.readFile(path), `${this.repository}:${path}`);
  }

  private async getContent(path: string) {
    try {
      const response = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ...(this.ref !== undefined ? { ref: this.ref } : {}),
      });
      return response.data;
    } catch (err) {
      const status = httpStatus(err);
      throw new IOError(
        `Failed to read ${this.repository}:${path}${status !== undefined ? ` (HTTP ${status})` : ''}: ${describeError(err)}`,
        { cause: err }
      );
    }
  }

  private async listDirectory(path: string): Promise<ContentEntry[]> {
    const data = await this.getContent(path);
    if (!Array.isArray(data)) {
      throw new IOError(`${this.repository}:${path} is not a directory`);
    }
    return data.map(entry => ({ name: entry.name, type: entry.type }));
  }

  private async readFile(path: string): Promise<string> {
    const data = await this.getContent(path);
    if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
      throw new IOError(`${this.repository}:${path} is not a regular file`);
    }
    if (data.encoding !== 'base64') {
      throw new IOError(`${this.repository}:${path} has unsupported encoding '${data.encoding}'`);
    }
    return Buffer.from(data.content, 'base64').toString('utf-8');
  }
}
