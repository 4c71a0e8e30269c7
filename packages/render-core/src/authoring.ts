/**
 * Helpers a component module imports as `@fastblocks/render-core`. The compiler
 * hands this module to the sandbox, so everything here must be safe to share
 * between components.
 */

import type { RenderContext } from "./render/context";

export type RenderResult = string | Promise<string>;

/**
 * The one capability a compiled component exposes.
 */
export interface Renderable {
  render(context: RenderContext): RenderResult;
}

export interface ComponentDefinition extends Renderable {
  /** Shown in diagnostics; defaults to the file name. */
  displayName?: string;
}

export const defineComponent = <TDefinition extends ComponentDefinition>(definition: TDefinition): TDefinition =>
  definition;

export const isRenderable = (value: unknown): value is Renderable =>
  (typeof value === "object" || typeof value === "function") &&
  value !== null &&
  "render" in value &&
  typeof value.render === "function";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export const escapeHtml = (value: unknown): string =>
  String(value ?? "").replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

/**
 * Serializes an attribute map; `false`, `null` and `undefined` drop the
 * attribute, `true` renders it bare.
 */
export const attrs = (attributes: Record<string, unknown>): string =>
  Object.entries(attributes)
    .filter(([, value]) => value !== false && value !== null && value !== undefined)
    .map(([name, value]) => (value === true ? name : `${name}="${escapeHtml(value)}"`))
    .join(" ");
