import { DEFAULT_OUTPUT_WIDTH } from '../operations/operation-runner.js';
import type {
  Logger,
  OutputSink,
  ProjectDefinition,
  Severity,
  ValidationEntry,
  ValidationReport,
} from '../types.js';

const MAX_ID_LENGTH = 30;
const ID_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

const MARKERS: Record<Severity, string> = {
  pass: '[✔]',
  warning: '[~]',
  'fix-required': '[✘]',
};

export interface RenderOptions {
  /**
   * Separator width
   * Default: sink.columns, else 80
   */
  width?: number;
}

/**
 * Check a project ID against the naming rules.
 *
 * Rules are checked in order (length, emptiness, leading letter, whitespace,
 * character set) and the first one broken is returned.
 *
 * @returns the violated rule, or undefined when the ID is valid
 */
export function validateProjectId(id: string): string | undefined {
  const length = Buffer.byteLength(id, 'utf8');
  if (length >= MAX_ID_LENGTH) {
    return `ID must be under ${MAX_ID_LENGTH} characters (current: ${length})`;
  }
  if (id === '') {
    return 'ID cannot be empty';
  }
  if (!/^\p{L}/u.test(id)) {
    return 'ID must start with a letter';
  }
  if (/\s/u.test(id)) {
    return 'ID cannot contain whitespace';
  }
  if (!ID_PATTERN.test(id)) {
    return 'ID can only contain letters, numbers, dashes, and underscores';
  }
  return undefined;
}

/**
 * Definition Validator - structural completeness check for a definition
 *
 * Identity and language are required; repository URL, dependencies, test
 * and build steps only produce warnings; install steps are reported when
 * present and ignored otherwise.
 *
 * @example
 * ```typescript
 * const validator = new DefinitionValidator(logger);
 * const report = validator.validate(definition);
 * validator.render(report, process.stdout);
 * ```
 */
export class DefinitionValidator {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Classify every field of the definition. Pure.
   */
  validate(definition: ProjectDefinition): ValidationReport {
    const entries: ValidationEntry[] = [];
    const fixes: string[] = [];
    const suggestions: string[] = [];

    const pass = (message: string) => entries.push({ severity: 'pass', message });
    const warn = (message: string, suggestion: string) => {
      entries.push({ severity: 'warning', message });
      suggestions.push(suggestion);
    };
    const fail = (message: string, fix: string) => {
      entries.push({ severity: 'fix-required', message });
      fixes.push(fix);
    };

    const id = definition.id || definition.name;
    if (!id) {
      fail('ID is required', 'Set an ID for the project');
    } else {
      const violation = validateProjectId(id);
      if (violation) {
        fail(
          `Invalid ID: ${violation}`,
          'Use a valid project ID (letters, numbers, dashes and underscores, starting with a letter, under 30 characters)'
        );
      } else {
        pass(`ID: ${id}`);
      }
    }

    if (definition.id && definition.name) {
      pass(`Name: ${definition.name}`);
    }

    if (definition.repoUrl) {
      pass(`Repository URL: ${definition.repoUrl}`);
    } else {
      fail('Repository URL is required', 'Set a repository URL for the project');
    }

    const { codebase } = definition;

    if (codebase.language?.trim()) {
      pass(`Language: ${codebase.language}`);
    } else {
      fail('Language is required', 'Set a language in the codebase');
    }

    if (codebase.dependencies && codebase.dependencies.length > 0) {
      pass(`Dependencies: ${codebase.dependencies.join(', ')}`);
    } else {
      warn('No dependencies defined', 'Declare the dependencies of the codebase');
    }

    if (codebase.install.steps.length > 0) {
      pass(`Install steps (${codebase.install.steps.length})`);
    }

    if (codebase.test.steps.length > 0) {
      pass(`Test steps (${codebase.test.steps.length})`);
    } else {
      warn('No test steps defined', 'Set test steps in the codebase');
    }

    if (codebase.build.steps.length > 0) {
      pass(`Build steps (${codebase.build.steps.length})`);
    } else {
      warn('No build steps defined', 'Set build steps in the codebase');
    }

    return { entries, fixes, suggestions, ok: fixes.length === 0 };
  }

  /**
   * Write a report: one marked line per entry, a separator, then the
   * suggestions and fixes blocks
   */
  render(report: ValidationReport, sink: OutputSink, options?: RenderOptions): void {
    const width = options?.width || sink.columns || DEFAULT_OUTPUT_WIDTH;
    const lines: string[] = report.entries.map(
      (entry) => `${MARKERS[entry.severity]} ${entry.message}`
    );

    lines.push('='.repeat(width));

    if (report.suggestions.length > 0) {
      lines.push('Suggestions:', ...report.suggestions.map((s) => `  - ${s}`));
    }
    if (report.fixes.length > 0) {
      lines.push('Fixes:', ...report.fixes.map((f) => `  - ${f}`));
    }

    sink.write(`${lines.join('\n')}\n`);
  }

  /**
   * Validate, write the report and fail when fixes are required
   *
   * @throws DefinitionInvalidError naming the number of required fixes
   */
  validateTo(definition: ProjectDefinition, sink: OutputSink, options?: RenderOptions): ValidationReport {
    const report = this.validate(definition);
    this.render(report, sink, options);

    if (!report.ok) {
      throw new DefinitionInvalidError(report.fixes);
    }

    this.logger?.info('Project definition validated successfully', {
      warnings: report.suggestions.length,
    });
    return report;
  }
}

/**
 * The definition has at least one required fix
 */
export class DefinitionInvalidError extends Error {
  constructor(public fixes: string[]) {
    super(`found ${fixes.length} required ${fixes.length === 1 ? 'fix' : 'fixes'}`);
    this.name = 'DefinitionInvalidError';
  }
}
