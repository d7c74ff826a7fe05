/**
 * Per-invocation temporary workspace
 *
 * One directory per message, removed with everything in it when processing
 * ends, whichever way it ends.
 */

import { rmSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const WORKSPACE_PREFIX = 'vm2mp3-';

/** Workspaces created and not yet disposed */
const live = new Set<Workspace>();

/**
 * Exclusively owned temporary directory
 */
export class Workspace {
  readonly path: string;
  private disposed = false;

  constructor(path: string) {
    this.path = path;
  }

  /**
   * Absolute path of a file inside the workspace
   */
  file(name: string): string {
    return join(this.path, name);
  }

  async write(name: string, data: Buffer): Promise<string> {
    const target = this.file(name);
    await writeFile(target, data);
    return target;
  }

  async read(name: string): Promise<Buffer> {
    return readFile(this.file(name));
  }

  /**
   * Removes the directory and its contents; safe to call more than once
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    live.delete(this);
    await rm(this.path, { recursive: true, force: true });
  }

  /**
   * Synchronous {@link dispose}, for signal handlers that exit right after
   */
  disposeSync(): void {
    if (this.disposed) return;
    this.disposed = true;
    live.delete(this);
    rmSync(this.path, { recursive: true, force: true });
  }
}

/**
 * Creates a fresh workspace under `parent`
 *
 * @param parent - Parent directory, the OS temp dir by default
 */
export async function createWorkspace(parent: string = tmpdir()): Promise<Workspace> {
  const path = await mkdtemp(join(parent, WORKSPACE_PREFIX));
  const workspace = new Workspace(path);
  live.add(workspace);
  return workspace;
}

/**
 * Removes every workspace that has not been disposed yet
 *
 * @returns Number of directories removed
 */
export function releaseWorkspaces(): number {
  const pending = [...live];
  for (const workspace of pending) {
    workspace.disposeSync();
  }
  return pending.length;
}

/**
 * Runs `fn` with a workspace that is disposed afterwards
 *
 * @param parent - Parent directory for the workspace
 * @param fn - Work to do
 * @returns Whatever `fn` returns; its error propagates after cleanup
 */
export async function withWorkspace<T>(parent: string | undefined, fn: (workspace: Workspace) => Promise<T>): Promise<T> {
  const workspace = await createWorkspace(parent);
  try {
    return await fn(workspace);
  } finally {
    await workspace.dispose();
  }
}
