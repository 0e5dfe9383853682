export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

export class ProjectNotFoundError extends Error {
  constructor(owner: string, projectNumber: number) {
    super(`Project number ${projectNumber} not found under owner '${owner}'.`);
    this.name = 'ProjectNotFoundError';
  }
}

export class StatusFieldMissingError extends Error {
  constructor(projectTitle: string) {
    super(
      `Could not find a 'Status' single-select field on project '${projectTitle}'. ` +
      'Create it first with options: Todo, In Progress, Done.',
    );
    this.name = 'StatusFieldMissingError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
