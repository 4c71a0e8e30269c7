import nunjucks, { type Environment } from "nunjucks";
import { TemplateRenderError } from "../errors";
import { createLogger, type Logger } from "../util/logger";
import { TEMPLATE_RENDER_KEY, createTemplateVars, forwardTemplateVars, type RenderVars } from "./context";

export interface BlockTemplatesOptions {
  /** Template roots, highest precedence first. */
  templatePaths: readonly string[];
  autoescape?: boolean;
  logger?: Logger;
}

/** Renders a component for a template; receives the fully merged vars. */
export type TemplateComponentInvoker = (componentName: string, vars: RenderVars) => Promise<string>;

type FilterCallback = (error: unknown, result?: unknown) => void;

type RenderCallback = (error: unknown, result: string | null) => void;

interface FilterThis {
  ctx?: Record<string, unknown>;
}

const isFilterCallback = (value: unknown): value is FilterCallback => typeof value === "function";

const isPlainVars = (value: unknown): value is RenderVars =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const COMPONENT_FILTER = "component";

/**
 * Block template engine. Templates reach components through the async
 * `component` filter once an invoker is bound:
 *
 *     {{ "user_card" | component({ title: "Hello" }) }}
 */
export class BlockTemplates {
  readonly environment: Environment;
  private readonly logger: Logger;
  private componentInvoker?: TemplateComponentInvoker;
  /** First component failure of each in-flight render, by render id. */
  private readonly componentFailures = new Map<string, unknown>();
  private renderCount = 0;

  constructor(options: BlockTemplatesOptions) {
    const loader = new nunjucks.FileSystemLoader([...options.templatePaths], { noCache: false });
    this.environment = new nunjucks.Environment(loader, {
      autoescape: options.autoescape ?? true,
      throwOnUndefined: false
    });
    this.logger = options.logger ?? createLogger("templates");
  }

  bindComponentInvoker(invoker: TemplateComponentInvoker): void {
    const firstBinding = this.componentInvoker === undefined;
    this.componentInvoker = invoker;
    if (!firstBinding) return;

    const invoke = (componentName: string, vars: RenderVars) => this.invokeComponent(componentName, vars);
    const failures = this.componentFailures;
    this.environment.addFilter(
      COMPONENT_FILTER,
      function (this: FilterThis, ...args: unknown[]) {
        const done = args.pop();
        if (!isFilterCallback(done)) {
          throw new Error("component filter must be called asynchronously");
        }
        const [componentName, sub] = args;
        if (typeof componentName !== "string") {
          done(new Error("component filter expects a component name"));
          return;
        }
        if (sub !== undefined && !isPlainVars(sub)) {
          done(new Error(`component filter arguments for '${componentName}' must be an object`));
          return;
        }
        const vars = forwardTemplateVars(this.ctx ?? {}, sub);
        const renderId = this.ctx?.[TEMPLATE_RENDER_KEY];
        invoke(componentName, vars).then(
          (html) => done(null, new nunjucks.runtime.SafeString(html)),
          (error: unknown) => {
            // nunjucks rewraps the error and loses its class
            if (typeof renderId === "string" && !failures.has(renderId)) {
              failures.set(renderId, error);
            }
            done(error);
          }
        );
      },
      true
    );
  }

  /**
   * A component failing inside the template surfaces as the cause of the
   * TemplateRenderError, with its own class.
   */
  render(templateName: string, vars?: RenderVars): Promise<string> {
    return this.run(templateName, vars, (context, done) => this.environment.render(templateName, context, done));
  }

  renderString(source: string, vars?: RenderVars, templateName = "<string>"): Promise<string> {
    return this.run(templateName, vars, (context, done) => this.environment.renderString(source, context, done));
  }

  private run(
    templateName: string,
    vars: RenderVars | undefined,
    start: (context: Record<string, unknown>, done: RenderCallback) => void
  ): Promise<string> {
    this.renderCount += 1;
    const renderId = `render_${this.renderCount}`;
    const context = { ...createTemplateVars(vars), [TEMPLATE_RENDER_KEY]: renderId };
    return new Promise((resolve, reject) => {
      start(context, (error, result) => {
        const componentFailure = this.componentFailures.get(renderId);
        this.componentFailures.delete(renderId);
        if (error) {
          this.logger.debug("Template render failed", { templateName, error });
          reject(new TemplateRenderError(templateName, componentFailure ?? error));
          return;
        }
        resolve(result ?? "");
      });
    });
  }

  private invokeComponent(componentName: string, vars: RenderVars): Promise<string> {
    const invoker = this.componentInvoker;
    if (!invoker) {
      return Promise.reject(new Error(`No component engine bound; cannot render '${componentName}'`));
    }
    return invoker(componentName, vars);
  }
}

export const createBlockTemplates = (options: BlockTemplatesOptions): BlockTemplates => new BlockTemplates(options);
