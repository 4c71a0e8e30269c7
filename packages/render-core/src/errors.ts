import { describeError } from "./util/logger";

export class ComponentNotFoundError extends Error {
  readonly componentName: string;

  constructor(componentName: string, detail?: string) {
    super(`Component '${componentName}' not found${detail ? `: ${detail}` : ""}`);
    this.name = "ComponentNotFoundError";
    this.componentName = componentName;
  }
}

/**
 * The component file exists but could not be turned into a renderable object:
 * transpiling failed, evaluating the module threw, or no export qualifies.
 */
export class ComponentCompilationError extends Error {
  readonly componentName: string;

  constructor(componentName: string, cause: unknown) {
    super(`Failed to compile component '${componentName}': ${describeError(cause)}`, { cause });
    this.name = "ComponentCompilationError";
    this.componentName = componentName;
  }
}

export class ComponentRenderError extends Error {
  readonly componentName: string;

  constructor(componentName: string, cause: unknown) {
    super(`Failed to render component '${componentName}': ${describeError(cause)}`, { cause });
    this.name = "ComponentRenderError";
    this.componentName = componentName;
  }
}

export class TemplateRenderError extends Error {
  readonly templateName: string;

  constructor(templateName: string, cause: unknown) {
    super(`Failed to render template '${templateName}': ${describeError(cause)}`, { cause });
    this.name = "TemplateRenderError";
    this.templateName = templateName;
  }
}

export class DeadlineExceededError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} exceeded its ${timeoutMs}ms deadline`);
    this.name = "DeadlineExceededError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class OperationAbortedError extends Error {
  readonly operation: string;

  constructor(operation: string, reason?: unknown) {
    super(`${operation} was aborted${reason === undefined ? "" : `: ${describeError(reason)}`}`, {
      cause: reason
    });
    this.name = "OperationAbortedError";
    this.operation = operation;
  }
}

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid render settings: ${issues.join("; ")}`);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

export type ComponentErrorKind = "not_found" | "compilation" | "render";

/** Kind of the outermost component error in the `cause` chain, if any. */
export const classifyComponentError = (error: unknown): ComponentErrorKind | null => {
  const seen = new Set<unknown>();
  let current = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ComponentNotFoundError) return "not_found";
    if (current instanceof ComponentCompilationError) return "compilation";
    if (current instanceof ComponentRenderError) return "render";
    seen.add(current);
    current = current.cause;
  }
  return null;
};
