import { escapeHtml } from "../authoring";
import type { KeyValueCache } from "../cache/types";
import type { RenderSettings } from "../config";
import { LifecycleManager, createComponentId } from "../components/lifecycle";
import {
  ComponentRegistry,
  type ComponentMetadata,
  type ScaffoldOptions
} from "../components/registry";
import type { ComponentPath } from "../components/paths";
import { ComponentRenderError, classifyComponentError, type ComponentErrorKind } from "../errors";
import type { BlobStorage } from "../storage/types";
import { configureLogger, createLogger, describeError, type Logger } from "../util/logger";
import { createComponentContext, type EngineBindings, type RenderVars } from "./context";
import { BlockTemplates } from "./templates";

export interface HybridRendererOptions {
  registry: ComponentRegistry;
  templates: BlockTemplates;
  /** Omit to render without hooks or component state. */
  lifecycle?: LifecycleManager;
  inlineInteropErrors?: boolean;
  debugComponents?: boolean;
  logger?: Logger;
}

export interface RendererCollaborators {
  cache?: KeyValueCache;
  storage?: BlobStorage;
  modules?: Readonly<Record<string, unknown>>;
  logger?: Logger;
}

export interface RenderComponentOptions {
  /** Vars of the enclosing render; the component's own vars override them. */
  parentVars?: RenderVars;
  /** Reuse an instance id so state set by earlier renders is visible. */
  componentId?: string;
  signal?: AbortSignal;
}

export type RenderOutcome =
  | { ok: true; html: string; status: 200 }
  | { ok: false; kind: ComponentErrorKind; status: 404 | 500; html: string; error: Error };

type InteropKind = "template" | "component";

const STATUS_BY_KIND: Record<ComponentErrorKind, 404 | 500> = {
  not_found: 404,
  compilation: 404,
  render: 500
};

/**
 * Front door of the render core: renders components and block templates and
 * wires each engine's invoker to the other.
 */
export class HybridRenderer {
  readonly registry: ComponentRegistry;
  readonly templates: BlockTemplates;
  readonly lifecycle?: LifecycleManager;
  private readonly inlineInteropErrors: boolean;
  private readonly debugComponents: boolean;
  private readonly logger: Logger;
  private readonly engines: EngineBindings;

  constructor(options: HybridRendererOptions) {
    this.registry = options.registry;
    this.templates = options.templates;
    this.lifecycle = options.lifecycle;
    this.inlineInteropErrors = options.inlineInteropErrors ?? false;
    this.debugComponents = options.debugComponents ?? false;
    this.logger = options.logger ?? createLogger("renderer");

    this.engines = {
      renderTemplate: (templateName, vars) =>
        this.interop("template", templateName, () => this.templates.render(templateName, vars)),
      renderComponent: (componentName, vars) =>
        this.interop("component", componentName, () => this.renderComponent(componentName, vars))
    };
    this.templates.bindComponentInvoker(this.engines.renderComponent);
  }

  /** Also applies `settings.logLevel` to the global logger. */
  static fromSettings(settings: RenderSettings, collaborators: RendererCollaborators = {}): HybridRenderer {
    configureLogger({ level: settings.logLevel });
    const logger = collaborators.logger;
    return new HybridRenderer({
      registry: ComponentRegistry.fromSettings(settings, collaborators),
      templates: new BlockTemplates({ templatePaths: settings.templatePaths, autoescape: settings.autoescape, logger }),
      lifecycle: settings.enableLifecycleHooks ? new LifecycleManager(logger) : undefined,
      inlineInteropErrors: settings.inlineInteropErrors,
      debugComponents: settings.debugComponents,
      logger
    });
  }

  /**
   * NotFound and compilation errors propagate as they are; anything thrown by
   * the component's `render` becomes a ComponentRenderError.
   */
  async renderComponent(componentName: string, vars?: RenderVars, options: RenderComponentOptions = {}): Promise<string> {
    const component = await this.registry.getComponentClass(componentName, options.signal);
    const lifecycle = this.lifecycle;
    const componentId = options.componentId ?? createComponentId(componentName);
    const context = createComponentContext({
      componentName,
      componentId,
      parentVars: options.parentVars,
      vars,
      state: lifecycle?.getState(componentId),
      setState: lifecycle ? (next) => lifecycle.setState(componentId, next) : undefined,
      engines: this.engines
    });

    await lifecycle?.emit("beforeRender", { componentName, componentId, vars: context.vars });
    let html: string;
    try {
      const output: unknown = await component.render(context);
      if (typeof output !== "string") {
        throw new TypeError(`render() returned ${output === null ? "null" : typeof output}, expected a string`);
      }
      html = output;
    } catch (error) {
      await lifecycle?.emit("onError", { componentName, componentId, error });
      throw new ComponentRenderError(componentName, error);
    }
    await lifecycle?.emit("afterRender", { componentName, componentId, html });
    return html;
  }

  renderTemplate(templateName: string, vars?: RenderVars): Promise<string> {
    return this.templates.render(templateName, vars);
  }

  renderTemplateString(source: string, vars?: RenderVars): Promise<string> {
    return this.templates.renderString(source, vars);
  }

  /**
   * Response-shaped variant of renderComponent; errors other than the three
   * component kinds still throw.
   */
  async renderComponentResult(
    componentName: string,
    vars?: RenderVars,
    options: RenderComponentOptions = {}
  ): Promise<RenderOutcome> {
    try {
      const html = await this.renderComponent(componentName, vars, options);
      return { ok: true, html, status: 200 };
    } catch (error) {
      const kind = classifyComponentError(error);
      if (kind === null || !(error instanceof Error)) {
        throw error;
      }
      this.logger.warn(`Component '${componentName}' failed`, { kind, error });
      return { ok: false, kind, status: STATUS_BY_KIND[kind], html: this.errorPage(componentName, error), error };
    }
  }

  clearComponentCache(componentName?: string): Promise<void> {
    return this.registry.clearComponentCache(componentName);
  }

  describeComponents(): Promise<ComponentMetadata[]> {
    return this.registry.describeComponents();
  }

  scaffoldComponent(componentName: string, options?: ScaffoldOptions): Promise<ComponentPath> {
    return this.registry.scaffoldComponent(componentName, options);
  }

  private async interop(kind: InteropKind, name: string, render: () => Promise<string>): Promise<string> {
    try {
      return await render();
    } catch (error) {
      if (!this.inlineInteropErrors) {
        throw error;
      }
      const message = describeError(error).replace(/-->/g, "--&gt;");
      this.logger.warn(`Inlined ${kind} error for '${name}'`, { error });
      return `<!-- Error rendering ${kind} '${name}': ${message} -->`;
    }
  }

  private errorPage(componentName: string, error: Error): string {
    const name = escapeHtml(componentName);
    if (this.debugComponents) {
      return `<html><body><h3>Component ${name} error:</h3><pre>${escapeHtml(error.stack ?? error.message)}</pre></body></html>`;
    }
    return `<html><body>Component ${name} error: ${escapeHtml(error.message)}</body></html>`;
  }
}

export const createHybridRenderer = (options: HybridRendererOptions): HybridRenderer => new HybridRenderer(options);
