/**
 * Component compilation: transpile with esbuild, evaluate the CommonJS output
 * in a fresh vm context, then pick the module's renderable export.
 */

import vm from "node:vm";
import { transform } from "esbuild";
import { z } from "zod";
import * as authoring from "../authoring";
import type { Renderable } from "../authoring";
import { ComponentCompilationError } from "../errors";

/**
 * Specifier components import helpers from. Inside the sandbox it resolves to
 * the authoring helpers only (`defineComponent`, `isRenderable`, `escapeHtml`,
 * `attrs`), not to the package's full entry point; hosts expose anything else
 * through `modules`.
 */
export const AUTHORING_MODULE_ID = "@fastblocks/render-core";

export const BYTECODE_FORMAT = 1;

export interface EvaluateOptions {
  /**
   * Extra modules a component may `require`, by specifier.
   */
  modules?: Readonly<Record<string, unknown>>;
  /** Bound for the synchronous part of module evaluation. */
  timeoutMs?: number;
  console?: Console;
}

export interface CompiledModule {
  component: Renderable;
  /** Transpiled CommonJS text; what the bytecode cache stores. */
  code: string;
}

const LOADERS: Record<string, "ts" | "js"> = {
  ".ts": "ts",
  ".mts": "ts",
  ".js": "js",
  ".mjs": "js"
};

export async function transpileComponent(name: string, source: string, fileName: string): Promise<string> {
  const extension = fileName.slice(fileName.lastIndexOf("."));
  try {
    const result = await transform(source, {
      loader: LOADERS[extension] ?? "ts",
      format: "cjs",
      target: "node20",
      sourcefile: fileName,
      sourcemap: "inline"
    });
    return result.code;
  } catch (error) {
    throw new ComponentCompilationError(name, error);
  }
}

interface ModuleRecord {
  exports: unknown;
}

/**
 * Runs transpiled code in its own context. The sandbox sees `module`,
 * `exports`, `require` and `console` only; `require` resolves the authoring
 * helpers and whatever `modules` lists.
 */
export function evaluateComponent(
  name: string,
  code: string,
  fileName: string,
  options: EvaluateOptions = {}
): Renderable {
  const record: ModuleRecord = { exports: {} };
  const modules: Record<string, unknown> = { [AUTHORING_MODULE_ID]: authoring, ...options.modules };
  const sandboxRequire = (specifier: string): unknown => {
    if (Object.prototype.hasOwnProperty.call(modules, specifier)) {
      return modules[specifier];
    }
    throw new Error(`Cannot require '${specifier}' from a component module`);
  };

  try {
    const context = vm.createContext({
      module: record,
      exports: record.exports,
      require: sandboxRequire,
      console: options.console ?? console
    });
    new vm.Script(code, { filename: fileName }).runInContext(context, {
      timeout: options.timeoutMs,
      displayErrors: false
    });
  } catch (error) {
    throw new ComponentCompilationError(name, error);
  }

  return selectRenderable(name, record.exports);
}

/**
 * Export precedence: `default`, then `module.exports` itself, then a single
 * renderable named export.
 */
export function selectRenderable(name: string, moduleExports: unknown): Renderable {
  if (typeof moduleExports !== "object" && typeof moduleExports !== "function") {
    throw new ComponentCompilationError(name, new Error("module has no exports"));
  }
  if (moduleExports === null) {
    throw new ComponentCompilationError(name, new Error("module has no exports"));
  }

  if ("default" in moduleExports && authoring.isRenderable(moduleExports.default)) {
    return moduleExports.default;
  }
  if (authoring.isRenderable(moduleExports)) {
    return moduleExports;
  }

  const candidates: string[] = [];
  let selected: Renderable | undefined;
  for (const [exportName, value] of Object.entries(moduleExports)) {
    if (exportName !== "default" && authoring.isRenderable(value)) {
      candidates.push(exportName);
      selected = value;
    }
  }
  if (candidates.length > 1) {
    throw new ComponentCompilationError(
      name,
      new Error(`ambiguous renderable exports (${candidates.join(", ")}); export one component as default`)
    );
  }
  if (!selected) {
    throw new ComponentCompilationError(name, new Error("no export with a render() function"));
  }
  return selected;
}

export async function compileComponent(
  name: string,
  source: string,
  fileName: string,
  options: EvaluateOptions = {}
): Promise<CompiledModule> {
  const code = await transpileComponent(name, source, fileName);
  return { component: evaluateComponent(name, code, fileName, options), code };
}

const BytecodeEnvelopeSchema = z.object({
  format: z.literal(BYTECODE_FORMAT),
  component: z.string(),
  code: z.string(),
  compiledAt: z.string()
});

export type BytecodeEnvelope = z.infer<typeof BytecodeEnvelopeSchema>;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const encodeBytecode = (component: string, code: string, compiledAt = new Date().toISOString()): Uint8Array =>
  encoder.encode(JSON.stringify({ format: BYTECODE_FORMAT, component, code, compiledAt } satisfies BytecodeEnvelope));

/**
 * Returns null for anything that is not a current-format envelope.
 */
export const decodeBytecode = (data: Uint8Array): BytecodeEnvelope | null => {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(data));
  } catch {
    return null;
  }
  const parsed = BytecodeEnvelopeSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
};
