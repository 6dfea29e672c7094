/**
 * GitClient: read-only wrapper around the git CLI.
 *
 * All git operations use child_process.execFile('git', ...). Nothing here
 * writes to the repository: the orchestrator only ever reads history.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { NotFoundError } from '../promotion/errors.js';
import type { CommitEntry, VcsHistoryProvider } from './types.js';

const execFileAsync = promisify(execFile);

const FULL_HASH = /^[0-9a-f]{40}$/;

export class GitError extends Error {
  constructor(
    public readonly command: string,
    message: string
  ) {
    super(`git ${command}: ${message}`);
    this.name = 'GitError';
  }
}

export class GitClient implements VcsHistoryProvider {
  constructor(private repoPath: string) {}

  async isRepo(): Promise<boolean> {
    try {
      await this.exec(['rev-parse', '--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  async head(): Promise<string> {
    try {
      const output = await this.exec(['rev-parse', '--verify', 'HEAD^{commit}']);
      return output.trim().toLowerCase();
    } catch (err) {
      throw this.noRepository(err);
    }
  }

  async currentBranch(): Promise<string> {
    try {
      const output = await this.exec(['rev-parse', '--abbrev-ref', 'HEAD']);
      return output.trim();
    } catch (err) {
      throw this.noRepository(err);
    }
  }

  async log(ref: string | undefined, limit: number): Promise<CommitEntry[]> {
    // Use a delimiter that won't appear in commit messages
    const SEP = '---GIT_LOG_SEP---';
    const args = ['log', `--format=%H${SEP}%s`, `-${limit}`];
    if (ref) args.push(ref);
    let output: string;
    try {
      output = await this.exec(args);
    } catch (err) {
      if (ref && (await this.isRepo())) {
        const cause = err instanceof Error ? err.message : String(err);
        throw new NotFoundError('commit', ref, `Unknown revision '${ref}' (${cause})`);
      }
      throw this.noRepository(err);
    }

    const entries: CommitEntry[] = [];
    for (const line of output.split('\n')) {
      if (!line) continue;
      const sepIndex = line.indexOf(SEP);
      if (sepIndex === -1) continue;
      entries.push({
        hash: line.slice(0, sepIndex).toLowerCase(),
        subject: line.slice(sepIndex + SEP.length),
      });
    }
    return entries;
  }

  async hasCommit(hash: string): Promise<boolean> {
    if (!FULL_HASH.test(hash)) return false;
    try {
      await this.exec(['cat-file', '-e', `${hash}^{commit}`]);
      return true;
    } catch {
      return false;
    }
  }

  async findByPrefix(prefix: string): Promise<string[]> {
    const needle = prefix.toLowerCase();
    // rev-list walks every ref, so commits on other branches and tags count as known
    let output: string;
    try {
      output = await this.exec(['rev-list', '--all']);
    } catch (err) {
      throw this.noRepository(err);
    }
    const matches = new Set<string>();
    for (const line of output.split('\n')) {
      const hash = line.trim().toLowerCase();
      if (hash && hash.startsWith(needle)) {
        matches.add(hash);
      }
    }
    return [...matches];
  }

  async subject(hash: string): Promise<string | undefined> {
    try {
      const output = await this.exec(['log', '-1', '--format=%s', hash]);
      const subject = output.trim();
      return subject || undefined;
    } catch {
      return undefined;
    }
  }

  // ───── Internal helpers ─────

  private noRepository(err: unknown): NotFoundError {
    const cause = err instanceof Error ? err.message : String(err);
    return new NotFoundError('repository', this.repoPath, `No identifiable source tree at ${this.repoPath} (${cause})`);
  }

  private async exec(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, {
        cwd: this.repoPath,
        maxBuffer: 32 * 1024 * 1024, // rev-list --all on large histories
      });
      return stdout;
    } catch (err: unknown) {
      const stderr =
        typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string'
          ? err.stderr.trim()
          : '';
      const message = stderr || (err instanceof Error ? err.message : 'Unknown git error');
      throw new GitError(args[0] ?? '', message);
    }
  }
}
