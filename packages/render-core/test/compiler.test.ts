import { describe, expect, it } from "vitest";
import {
  compileComponent,
  decodeBytecode,
  encodeBytecode,
  evaluateComponent,
  selectRenderable
} from "../src/components/compiler";
import { createComponentContext, type EngineBindings, type RenderContext } from "../src/render/context";
import { ComponentCompilationError } from "../src/errors";
import { THROWING_SOURCE, USER_CARD_SOURCE } from "./helpers/fixtures";

const engines: EngineBindings = {
  renderTemplate: async (name) => `[template ${name}]`,
  renderComponent: async (name) => `[component ${name}]`
};

const contextFor = (vars: Record<string, unknown>): RenderContext =>
  createComponentContext({ componentName: "user_card", componentId: "user_card_00000000", vars, engines });

describe("compileComponent", () => {
  it("compiles a default-exported component", async () => {
    const { component, code } = await compileComponent("user_card", USER_CARD_SOURCE, "/components/user_card.ts");

    const html = await component.render(contextFor({ title: "Welcome", name: "Ada" }));

    expect(html).toBe('<div class="user-card"><h2>Welcome</h2><p>Ada</p></div>');
    expect(code).toContain("require(\"@fastblocks/render-core\")");
  });

  it("escapes vars through the authoring helpers", async () => {
    const { component } = await compileComponent("user_card", USER_CARD_SOURCE, "/components/user_card.ts");

    const html = await component.render(contextFor({ title: "<b>", name: "A & B" }));

    expect(html).toBe('<div class="user-card"><h2>&lt;b&gt;</h2><p>A &amp; B</p></div>');
  });

  it("yields equivalent objects for identical source", async () => {
    const first = await compileComponent("user_card", USER_CARD_SOURCE, "/components/user_card.ts");
    const second = await compileComponent("user_card", USER_CARD_SOURCE, "/components/user_card.ts");
    const context = contextFor({ title: "Same", name: "Input" });

    expect(first.component).not.toBe(second.component);
    expect(await second.component.render(context)).toBe(await first.component.render(context));
  });

  it("wraps an exception raised while the module runs", async () => {
    const compiling = compileComponent("broken", THROWING_SOURCE, "/components/broken.ts");

    await expect(compiling).rejects.toBeInstanceOf(ComponentCompilationError);
    await expect(compiling).rejects.toThrow("Failed to compile component 'broken': boom during import");
  });

  it("wraps syntax errors", async () => {
    await expect(compileComponent("bad", "export default {", "/components/bad.ts")).rejects.toBeInstanceOf(
      ComponentCompilationError
    );
  });

  it("refuses modules outside the allowlist", async () => {
    const source = `import fs from "node:fs";\nexport default { render: () => String(fs) };\n`;

    await expect(compileComponent("reader", source, "/components/reader.ts")).rejects.toThrow(
      "Cannot require 'node:fs' from a component module"
    );
  });

  it("exposes only the authoring helpers under the package name", async () => {
    const source = `import { escapeHtml, mergeVars } from "@fastblocks/render-core";
export default { render: () => typeof escapeHtml + " " + typeof mergeVars };
`;

    const { component } = await compileComponent("helpers", source, "/components/helpers.ts");

    expect(await component.render(contextFor({}))).toBe("function undefined");
  });

  it("resolves modules registered by the host", async () => {
    const source = `import { greet } from "site-helpers";\nexport default { render: () => greet("Ada") };\n`;
    const modules = { "site-helpers": { greet: (name: string) => `Hello ${name}` } };

    const { component } = await compileComponent("greeting", source, "/components/greeting.ts", { modules });

    expect(await component.render(contextFor({}))).toBe("Hello Ada");
  });

  it("bounds synchronous evaluation", async () => {
    const source = "while (true) {}\nexport default { render: () => '' };\n";

    await expect(compileComponent("spin", source, "/components/spin.js", { timeoutMs: 50 })).rejects.toBeInstanceOf(
      ComponentCompilationError
    );
  });
});

describe("selectRenderable", () => {
  const renderable = { render: () => "ok" };

  it("prefers the default export", () => {
    const other = { render: () => "other" };
    expect(selectRenderable("x", { default: renderable, Other: other })).toBe(renderable);
  });

  it("accepts module.exports itself", () => {
    expect(selectRenderable("x", renderable)).toBe(renderable);
  });

  it("accepts a single renderable named export", () => {
    expect(selectRenderable("x", { Card: renderable, helper: () => "" })).toBe(renderable);
  });

  it("rejects several named candidates", () => {
    expect(() => selectRenderable("x", { A: renderable, B: { render: () => "b" } })).toThrow(
      "Failed to compile component 'x': ambiguous renderable exports (A, B); export one component as default"
    );
  });

  it("rejects modules without a renderable", () => {
    expect(() => selectRenderable("x", { helper: () => "" })).toThrow(
      "Failed to compile component 'x': no export with a render() function"
    );
    expect(() => selectRenderable("x", undefined)).toThrow("module has no exports");
  });
});

describe("bytecode envelope", () => {
  it("round-trips the transpiled code", () => {
    const data = encodeBytecode("user_card", "module.exports = {};", "2024-05-01T00:00:00.000Z");

    expect(decodeBytecode(data)).toEqual({
      format: 1,
      component: "user_card",
      code: "module.exports = {};",
      compiledAt: "2024-05-01T00:00:00.000Z"
    });
  });

  it("ignores other formats and garbage", () => {
    const encoder = new TextEncoder();
    expect(decodeBytecode(encoder.encode(JSON.stringify({ format: 2, component: "a", code: "", compiledAt: "" })))).toBeNull();
    expect(decodeBytecode(encoder.encode("not json"))).toBeNull();
  });

  it("evaluates stored code without transpiling", () => {
    const component = evaluateComponent(
      "plain",
      "module.exports = { render: (ctx) => 'hi ' + ctx.vars.name };",
      "/components/plain.js"
    );

    expect(component.render(contextFor({ name: "Ada" }))).toBe("hi Ada");
  });
});
