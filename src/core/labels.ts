import type { RepoRef } from '../types/github.js';
import { logger } from '../utils/logger.js';
import { createLabel, listLabels } from './github-project.js';

/**
 * Tracks which labels exist in the target repository for one run.
 * The label list is fetched once, on first use; labels created during the
 * run are added to the cache so each is created at most once.
 */
export class LabelRegistry {
  private known: Set<string> | null = null;

  constructor(
    private readonly repo: RepoRef,
    private readonly color: string,
    private readonly dryRun: boolean = false,
  ) {}

  private async load(): Promise<Set<string>> {
    if (!this.known) {
      const names = await listLabels(this.repo.owner, this.repo.name);
      this.known = new Set(names.map((name) => name.trim().toLowerCase()));
      logger.debug(`Loaded ${this.known.size} labels from ${this.repo.owner}/${this.repo.name}`);
    }
    return this.known;
  }

  /**
   * Create every label in `labels` that the repository does not have yet.
   * Returns the names that were created (or would be, in dry-run mode).
   */
  async ensure(labels: string[]): Promise<string[]> {
    if (labels.length === 0) return [];

    const known = await this.load();
    const created: string[] = [];

    for (const raw of labels) {
      const name = raw.trim();
      const key = name.toLowerCase();
      if (!name || known.has(key)) continue;

      if (this.dryRun) {
        logger.info(`Would create label: ${name}`);
        created.push(name);
      } else if (await createLabel(this.repo.owner, this.repo.name, name, this.color)) {
        logger.info(`Created label: ${name}`);
        created.push(name);
      }
      known.add(key);
    }

    return created;
  }
}
