/**
 * Run Workspace
 *
 * Temporary directory holding a run's local artifacts (downloaded sources,
 * cleaned outputs, the working copy of the audit log).
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export class RunWorkspace {
  private constructor(readonly dir: string) {}

  static async create(prefix = 'drive-sync-'): Promise<RunWorkspace> {
    return new RunWorkspace(await mkdtemp(join(tmpdir(), prefix)))
  }

  /**
   * Local path for a remote title. Path separators are replaced so every
   * artifact stays inside the workspace.
   */
  pathFor(title: string): string {
    return join(this.dir, title.replace(/[/\\]/g, '_'))
  }

  async write(title: string, content: Buffer | string): Promise<string> {
    const path = this.pathFor(title)
    await writeFile(path, content)
    return path
  }

  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true })
  }
}

/**
 * Run `fn` with a fresh workspace that is removed afterwards, whether `fn`
 * resolves or throws.
 */
export async function withWorkspace<T>(fn: (workspace: RunWorkspace) => Promise<T>): Promise<T> {
  const workspace = await RunWorkspace.create()
  try {
    return await fn(workspace)
  } finally {
    await workspace.dispose()
  }
}
