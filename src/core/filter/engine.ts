/**
 * Evaluates filter expressions against a stack.
 *
 * Several filters combine as: union of the positive filters (every unit
 * when there are none), then intersection with each negative filter.
 */
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { getChangedFiles, getRepositoryRoot } from '../../utils/git.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import type { Stack, Unit } from '../stack/types.js';
import { parseFilter } from './parser.js';
import type {
  ChangedFilesProvider,
  FilterExpression,
  FilterOperand,
  FilterResult,
  FilterTarget,
} from './types.js';

/**
 * Reads changed files from git and rebases them onto the stack directory.
 */
export class GitChangedFilesProvider implements ChangedFilesProvider {
  constructor(private readonly stackDir: string) {}

  async changedFiles(from: string, to?: string): Promise<string[]> {
    const root = await getRepositoryRoot(this.stackDir);
    if (!root) {
      throw new SystemError(
        ErrorCodes.COMMAND_FAILED,
        `Git filters need a repository, but ${this.stackDir} is not inside one`,
        { dir: this.stackDir }
      );
    }
    const files = await getChangedFiles(root, from, to);
    return files.map((file) => toPosix(path.relative(this.stackDir, path.join(root, file))));
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function isUnder(file: string, dir: string): boolean {
  if (dir === '' || dir === '.') return !file.startsWith('../');
  return file === dir || file.startsWith(`${dir}/`);
}

export interface FilterEngineOptions {
  changedFiles?: ChangedFilesProvider;
}

export class FilterEngine {
  private readonly changedFiles: ChangedFilesProvider;
  private readonly gitCache = new Map<string, Promise<Set<string>>>();

  constructor(
    private readonly stack: Stack,
    options: FilterEngineOptions = {}
  ) {
    this.changedFiles = options.changedFiles ?? new GitChangedFilesProvider(stack.dir);
  }

  /**
   * Parse and evaluate filters. Every filter is parsed before any is
   * evaluated, so syntax errors surface before git is consulted.
   */
  async evaluate(sources: readonly string[]): Promise<FilterResult> {
    const filters = sources.map((source) => parseFilter(source));
    const all = this.stack.graph.nodes();

    const positive = filters.filter((f) => !f.negative);
    const negative = filters.filter((f) => f.negative);

    let selected: Set<string>;
    if (positive.length === 0) {
      selected = new Set(all);
    } else {
      selected = new Set();
      for (const filter of positive) {
        for (const name of await this.select(filter)) selected.add(name);
      }
    }

    const excluded = new Set<string>();
    for (const filter of negative) {
      const kept = await this.select(filter);
      for (const name of selected) {
        if (!kept.has(name)) {
          excluded.add(name);
          selected.delete(name);
        }
      }
    }

    return {
      selected: new Set(all.filter((name) => selected.has(name))),
      excluded: new Set(all.filter((name) => excluded.has(name))),
      filters,
    };
  }

  /**
   * Units matched by one filter: the intersection of its operands.
   */
  async select(filter: FilterExpression): Promise<Set<string>> {
    let result: Set<string> | undefined;
    for (const operand of filter.operands) {
      const matched = await this.selectOperand(operand);
      result = result === undefined
        ? matched
        : new Set([...result].filter((name) => matched.has(name)));
    }
    return result ?? new Set();
  }

  private async selectOperand(operand: FilterOperand): Promise<Set<string>> {
    const matched = await this.matchTarget(operand.target);
    const graph = this.stack.graph;

    const expanded = new Set(matched);
    if (operand.withDependencies) {
      for (const name of graph.transitiveDependencies(matched)) expanded.add(name);
    }
    if (operand.withDependents) {
      for (const name of graph.transitiveDependents(matched)) expanded.add(name);
    }

    if (!operand.negated) {
      return expanded;
    }
    return new Set(graph.nodes().filter((name) => !expanded.has(name)));
  }

  private async matchTarget(target: FilterTarget): Promise<Set<string>> {
    if (target.kind === 'git') {
      return this.matchGit(target.from, target.to);
    }
    const units = [...this.stack.units.values()];
    return new Set(units.filter((unit) => matchesStatic(target, unit)).map((unit) => unit.name));
  }

  private matchGit(from: string, to?: string): Promise<Set<string>> {
    const cacheKey = `${from}...${to ?? ''}`;
    let pending = this.gitCache.get(cacheKey);
    if (!pending) {
      pending = this.computeGitMatches(from, to);
      this.gitCache.set(cacheKey, pending);
    }
    return pending;
  }

  private async computeGitMatches(from: string, to?: string): Promise<Set<string>> {
    const files = await this.changedFiles.changedFiles(from, to);
    const stackFile = this.stack.file ? toPosix(path.relative(this.stack.dir, this.stack.file)) : null;
    if (stackFile && files.includes(stackFile)) {
      return new Set(this.stack.graph.nodes());
    }

    const result = new Set<string>();
    for (const unit of this.stack.units.values()) {
      const dirs = [unit.path];
      const sourceDir = this.localSourceDir(unit);
      if (sourceDir !== null) dirs.push(sourceDir);
      if (files.some((file) => dirs.some((dir) => isUnder(file, dir)))) {
        result.add(unit.name);
      }
    }
    return result;
  }

  private localSourceDir(unit: Unit): string | null {
    if (!unit.source.local) return null;
    const absolute = path.resolve(this.stack.dir, unit.source.location, unit.source.subpath ?? '');
    return toPosix(path.relative(this.stack.dir, absolute));
  }
}

function matchesStatic(target: Exclude<FilterTarget, { kind: 'git' }>, unit: Unit): boolean {
  switch (target.kind) {
    case 'path':
      return unit.path === target.value || unit.name === target.value;
    case 'prefix':
      return isUnder(unit.path, target.prefix);
    case 'glob':
      return minimatch(unit.path, target.pattern) || minimatch(unit.name, target.pattern);
  }
}

/**
 * Convenience wrapper: evaluate filters against a stack with default git access.
 */
export function evaluateFilters(
  stack: Stack,
  filters: readonly string[],
  options: FilterEngineOptions = {}
): Promise<FilterResult> {
  return new FilterEngine(stack, options).evaluate(filters);
}
