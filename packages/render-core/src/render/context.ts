import type { ComponentState } from "../components/lifecycle";

export type RenderVars = Readonly<Record<string, unknown>>;

export type RenderEngine = "component" | "template";

export interface InvokeOptions {
  /**
   * Merge the caller's vars under the sub-context (default), or pass only the
   * sub-context.
   */
  inherit?: boolean;
}

/** Renders a block template by name. */
export type TemplateInvoker = (templateName: string, vars?: RenderVars, options?: InvokeOptions) => Promise<string>;

/** Renders a component by name. */
export type ComponentInvoker = (componentName: string, vars?: RenderVars, options?: InvokeOptions) => Promise<string>;

/**
 * Everything a component's `render` receives. The two invokers are the only
 * way across to the other engine.
 */
export interface RenderContext {
  readonly vars: RenderVars;
  readonly engine: RenderEngine;
  readonly componentName: string;
  readonly componentId: string;
  readonly state: ComponentState;
  readonly setState: (next: ComponentState) => Promise<void>;
  readonly renderTemplate: TemplateInvoker;
  readonly renderComponent: ComponentInvoker;
}

/**
 * The raw engines: render `name` with exactly the vars given.
 */
export interface EngineBindings {
  renderTemplate(templateName: string, vars: RenderVars): Promise<string>;
  renderComponent(componentName: string, vars: RenderVars): Promise<string>;
}

export interface ComponentContextInput {
  componentName: string;
  componentId: string;
  /** Enclosing context, e.g. the template that called the component. */
  parentVars?: RenderVars;
  /** Component-specific vars; override parent vars. */
  vars?: RenderVars;
  state?: ComponentState;
  setState?: (next: ComponentState) => Promise<void>;
  engines: EngineBindings;
}

export const TEMPLATE_ENGINE_KEY = "_engine";

/** Identifies one template render, so component failures can be traced back to it. */
export const TEMPLATE_RENDER_KEY = "_renderId";

export const mergeVars = (base: RenderVars | undefined, overrides: RenderVars | undefined): RenderVars =>
  Object.freeze({ ...base, ...overrides });

/**
 * Builds a fresh context for one component render. The caller's mappings are
 * copied, never mutated, so repeated renders do not share state.
 */
export function createComponentContext(input: ComponentContextInput): RenderContext {
  const vars = mergeVars(input.parentVars, input.vars);
  const forward = (sub: RenderVars | undefined, options?: InvokeOptions): RenderVars =>
    options?.inherit === false ? mergeVars(undefined, sub) : mergeVars(vars, sub);

  return Object.freeze({
    vars,
    engine: "component",
    componentName: input.componentName,
    componentId: input.componentId,
    state: input.state ?? Object.freeze({}),
    setState: input.setState ?? (async () => undefined),
    renderTemplate: (templateName: string, sub?: RenderVars, options?: InvokeOptions) =>
      input.engines.renderTemplate(templateName, forward(sub, options)),
    renderComponent: (componentName: string, sub?: RenderVars, options?: InvokeOptions) =>
      input.engines.renderComponent(componentName, forward(sub, options))
  } satisfies RenderContext);
}

/**
 * The mapping handed to the template engine: the caller's vars plus the engine
 * marker, as a new object.
 */
export function createTemplateVars(vars: RenderVars | undefined): Record<string, unknown> {
  return { ...vars, [TEMPLATE_ENGINE_KEY]: "template" };
}

/**
 * Vars a template forwards to a component it calls: its own context without
 * the engine markers, overridden by the call's arguments.
 */
export function forwardTemplateVars(templateVars: RenderVars, sub: RenderVars | undefined): RenderVars {
  const { [TEMPLATE_ENGINE_KEY]: _engine, [TEMPLATE_RENDER_KEY]: _renderId, ...rest } = templateVars;
  return mergeVars(rest, sub);
}
