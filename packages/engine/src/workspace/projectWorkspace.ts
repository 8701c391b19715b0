import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { loadEngineConfig } from '../config.js';
import { WorkspaceError } from '../errors.js';
import { projectFromJSON, projectToJSON } from '../song/projectCodec.js';
import type { SongProject } from '../song/songModel.js';
import { error } from '../util/diag.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('workspace');

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Directory of saved projects, one JSON file per project title.
 */
export class ProjectWorkspace {
  readonly root: string;

  constructor(root?: string) {
    this.root = root ?? loadEngineConfig().workspaceRoot;
  }

  pathFor(project: Pick<SongProject, 'title'>): string {
    return join(this.root, `${project.title.replace(/ /g, '_')}.json`);
  }

  async save(project: SongProject): Promise<string> {
    const path = this.pathFor(project);
    const payload = { ...projectToJSON(project), savedAt: new Date().toISOString() };
    try {
      await mkdir(this.root, { recursive: true });
      await writeFile(path, JSON.stringify(payload), 'utf8');
    } catch (err) {
      error('workspace', `Could not save project: ${reason(err)}`, { file: path });
      throw new WorkspaceError(`Could not save project to ${path}`, path, { cause: err });
    }
    log.info(`Saved '${project.title}' -> ${path}`);
    return path;
  }

  /** Saved project files, sorted by path. A missing root lists nothing. */
  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.root);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw new WorkspaceError(`Could not list workspace ${this.root}`, this.root, { cause: err });
    }
    return names.filter(name => name.endsWith('.json')).map(name => join(this.root, name)).sort();
  }

  async load(path: string): Promise<SongProject> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      error('workspace', `Could not read project: ${reason(err)}`, { file: path });
      throw new WorkspaceError(`Could not read project ${path}`, path, { cause: err });
    }
    try {
      return projectFromJSON(JSON.parse(text));
    } catch (err) {
      error('workspace', `Malformed project: ${reason(err)}`, { file: path });
      throw new WorkspaceError(`Malformed project file ${path}: ${reason(err)}`, path, { cause: err });
    }
  }
}
