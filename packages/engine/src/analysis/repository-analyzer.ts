/**
 * Repository Analyzer
 *
 * Builds the context a change generator works from: the repository
 * summary, the recursive file list of the default branch, languages by
 * byte count and frameworks detected from marker files.
 *
 * Framework detection is best effort. A failure there is logged and leaves
 * the framework list shorter; it never fails the analysis.
 *
 * @module @autopr/engine/analysis/repository-analyzer
 */

import { createLogger, nowIso, type RepositoryRef } from '@autopr/core';
import type { RepositoryFile, RepositoryGateway, RepositorySummary } from '@autopr/integrations';

const logger = createLogger('repository-analyzer');

// =============================================================================
// Types
// =============================================================================

export interface LanguageShare {
  name: string;
  bytes: number;
  /** Share of all bytes, 0-100 with one decimal */
  percent: number;
}

export interface RepositoryAnalysis {
  repository: RepositoryRef;
  summary: RepositorySummary;
  files: RepositoryFile[];
  truncated: boolean;
  languages: LanguageShare[];
  frameworks: string[];
  analyzedAt: string;
}

interface MarkerRule {
  framework: string;
  matches: (fileName: string) => boolean;
}

// =============================================================================
// Marker files
// =============================================================================

const exact = (name: string) => (fileName: string) => fileName === name;
const prefixed = (prefix: string) => (fileName: string) => fileName.startsWith(prefix);

const MARKER_RULES: MarkerRule[] = [
  { framework: 'Node.js', matches: exact('package.json') },
  { framework: 'TypeScript', matches: exact('tsconfig.json') },
  { framework: 'Python', matches: (f) => f === 'requirements.txt' || f === 'setup.py' },
  { framework: 'Python (pyproject)', matches: exact('pyproject.toml') },
  { framework: 'Go modules', matches: exact('go.mod') },
  { framework: 'Cargo', matches: exact('Cargo.toml') },
  { framework: 'Maven', matches: exact('pom.xml') },
  { framework: 'Gradle', matches: (f) => f === 'build.gradle' || f === 'build.gradle.kts' },
  { framework: 'Bundler', matches: exact('Gemfile') },
  { framework: 'Composer', matches: exact('composer.json') },
  { framework: 'Docker', matches: (f) => f === 'Dockerfile' || f === 'docker-compose.yml' },
  { framework: 'Next.js', matches: prefixed('next.config.') },
  { framework: 'Vite', matches: prefixed('vite.config.') },
  { framework: 'Django', matches: exact('manage.py') },
  { framework: 'Terraform', matches: (f) => f.endsWith('.tf') },
];

/**
 * Frameworks named by dependencies in a root package.json
 */
const PACKAGE_FRAMEWORKS = new Map<string, string>([
  ['react', 'React'],
  ['vue', 'Vue'],
  ['@angular/core', 'Angular'],
  ['express', 'Express'],
  ['fastify', 'Fastify'],
  ['@nestjs/core', 'NestJS'],
  ['vitest', 'Vitest'],
  ['jest', 'Jest'],
]);

function baseName(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

function rankLanguages(languages: Record<string, number>): LanguageShare[] {
  const total = Object.values(languages).reduce((sum, bytes) => sum + bytes, 0);
  return Object.entries(languages)
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
    .map(([name, bytes]) => ({
      name,
      bytes,
      percent: total === 0 ? 0 : Math.round((bytes / total) * 1000) / 10,
    }));
}

function dependencyNames(manifest: string): string[] {
  const parsed: unknown = JSON.parse(manifest);
  if (typeof parsed !== 'object' || parsed === null) return [];

  const names: string[] = [];
  for (const field of ['dependencies', 'devDependencies', 'peerDependencies']) {
    const deps: unknown = Reflect.get(parsed, field);
    if (typeof deps === 'object' && deps !== null) {
      names.push(...Object.keys(deps));
    }
  }
  return names;
}

// =============================================================================
// Analyzer
// =============================================================================

export class RepositoryAnalyzer {
  constructor(private readonly gateway: RepositoryGateway) {}

  async analyze(repository: RepositoryRef): Promise<RepositoryAnalysis> {
    const summary = await this.gateway.getRepositorySummary(repository);
    const listing = await this.gateway.listFiles(repository, summary.defaultBranch);
    const files = listing.files;

    return {
      repository,
      summary,
      files,
      truncated: listing.truncated,
      languages: rankLanguages(summary.languages),
      frameworks: await this.detectFrameworks(repository, summary.defaultBranch, files),
      analyzedAt: nowIso(),
    };
  }

  private async detectFrameworks(
    repository: RepositoryRef,
    ref: string,
    files: RepositoryFile[]
  ): Promise<string[]> {
    const found = new Set<string>();
    const fileNames = files.filter((f) => f.type === 'file').map((f) => baseName(f.path));

    for (const rule of MARKER_RULES) {
      if (fileNames.some(rule.matches)) {
        found.add(rule.framework);
      }
    }

    if (files.some((f) => f.path === 'package.json')) {
      try {
        const manifest = await this.gateway.getFileContent(repository, 'package.json', ref);
        for (const name of dependencyNames(manifest.content)) {
          const framework = PACKAGE_FRAMEWORKS.get(name);
          if (framework) found.add(framework);
        }
      } catch (error) {
        logger.warn('Framework detection from package.json failed', {
          repository: repository.fullName,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return [...found].sort();
  }
}
