import { z } from "zod";
import { loadSettings } from "../config";
import { SettingsError, classifyComponentError, type ComponentErrorKind } from "../errors";
import { HybridRenderer } from "../render/renderer";
import { describeError } from "../util/logger";

const RunnerInputSchema = z
  .object({
    component: z.string().min(1).optional(),
    template: z.string().min(1).optional(),
    context: z.record(z.unknown()).default({}),
    settings: z.record(z.unknown()).default({})
  })
  .refine((input) => (input.component === undefined) !== (input.template === undefined), {
    message: "Exactly one of component or template is required"
  });

type RunnerErrorKind = ComponentErrorKind | "input" | "settings" | "template" | "internal";

type RunnerOutput =
  | {
      ok: true;
      html: string;
    }
  | {
      ok: false;
      kind: RunnerErrorKind;
      error: string;
    };

async function readStdin(): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8").trim();
}

function writeOutput(payload: RunnerOutput): void {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}

function fail(kind: RunnerErrorKind, error: string): void {
  writeOutput({ ok: false, kind, error });
  process.exitCode = 1;
}

async function main(): Promise<void> {
  const raw = await readStdin();
  let json: unknown;
  try {
    json = raw ? JSON.parse(raw) : {};
  } catch (error) {
    fail("input", `Invalid JSON input: ${describeError(error)}`);
    return;
  }

  const parsed = RunnerInputSchema.safeParse(json);
  if (!parsed.success) {
    fail("input", parsed.error.issues.map((issue) => issue.message).join("; "));
    return;
  }
  const input = parsed.data;

  let renderer: HybridRenderer;
  try {
    const settings = loadSettings(input.settings);
    renderer = HybridRenderer.fromSettings(settings);
  } catch (error) {
    if (error instanceof SettingsError) {
      fail("settings", error.message);
      return;
    }
    throw error;
  }

  try {
    const html = input.component
      ? await renderer.renderComponent(input.component, input.context)
      : await renderer.renderTemplate(input.template ?? "", input.context);
    writeOutput({ ok: true, html });
  } catch (error) {
    fail(classifyComponentError(error) ?? "template", describeError(error));
  }
}

main().catch((error: unknown) => {
  fail("internal", describeError(error));
});
