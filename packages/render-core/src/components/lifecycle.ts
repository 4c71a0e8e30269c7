import { randomBytes } from "node:crypto";
import { createLogger, type Logger } from "../util/logger";

export type ComponentState = Readonly<Record<string, unknown>>;

export interface LifecycleEvents {
  beforeRender: { componentName: string; componentId: string; vars: Readonly<Record<string, unknown>> };
  afterRender: { componentName: string; componentId: string; html: string };
  onError: { componentName: string; componentId: string; error: unknown };
  onStateChange: { componentId: string; previous: ComponentState; next: ComponentState };
}

export type LifecycleEvent = keyof LifecycleEvents;

export type LifecycleHook<TEvent extends LifecycleEvent> = (payload: LifecycleEvents[TEvent]) => void | Promise<void>;

type HookTable = { [TEvent in LifecycleEvent]: Set<LifecycleHook<TEvent>> };

export const createComponentId = (componentName: string): string =>
  `${componentName}_${randomBytes(4).toString("hex")}`;

/**
 * Render hooks and per-instance component state. A failing hook is logged and
 * never interrupts rendering.
 */
export class LifecycleManager {
  private readonly hooks: HookTable = {
    beforeRender: new Set(),
    afterRender: new Set(),
    onError: new Set(),
    onStateChange: new Set()
  };
  private readonly states = new Map<string, ComponentState>();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger("lifecycle")) {
    this.logger = logger;
  }

  /**
   * Returns a function that unregisters the hook.
   */
  register<TEvent extends LifecycleEvent>(event: TEvent, hook: LifecycleHook<TEvent>): () => void {
    const hooks: Set<LifecycleHook<TEvent>> = this.hooks[event];
    hooks.add(hook);
    return () => {
      hooks.delete(hook);
    };
  }

  async emit<TEvent extends LifecycleEvent>(event: TEvent, payload: LifecycleEvents[TEvent]): Promise<void> {
    const hooks: Set<LifecycleHook<TEvent>> = this.hooks[event];
    for (const hook of [...hooks]) {
      try {
        await hook(payload);
      } catch (error) {
        this.logger.warn(`Lifecycle hook failed for ${event}`, { error });
      }
    }
  }

  getState(componentId: string): ComponentState {
    return this.states.get(componentId) ?? {};
  }

  async setState(componentId: string, next: ComponentState): Promise<void> {
    const previous = this.getState(componentId);
    this.states.set(componentId, next);
    await this.emit("onStateChange", { componentId, previous, next });
  }

  clearState(componentId: string): void {
    this.states.delete(componentId);
  }

  hookCount(event: LifecycleEvent): number {
    return this.hooks[event].size;
  }
}
