import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { runBudget } from "../src/commands/budget.js";
import { tokens } from "./helpers.js";

let home: string;
let project: string;
let input: string;

const sample = {
  concepts: [
    { id: "c1", text: tokens(40), priority: 0.9 },
    { id: "c2", text: tokens(40), priority: 0.5 },
    { id: "c3", text: tokens(40), priority: 0.1 },
  ],
};

function logged(): string {
  return vi.mocked(console.log).mock.calls.map((c) => c.map(String).join(" ")).join("\n");
}

function errored(): string {
  return vi.mocked(console.error).mock.calls.map((c) => c.map(String).join(" ")).join("\n");
}

// Suppress console output during tests and keep ~/.docpack out of the way
beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), "docpack-home-"));
  project = fs.mkdtempSync(path.join(os.tmpdir(), "docpack-project-"));
  input = path.join(project, "content.json");
  fs.writeFileSync(input, JSON.stringify(sample));
  vi.spyOn(os, "homedir").mockReturnValue(home);
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(home, { recursive: true, force: true });
  fs.rmSync(project, { recursive: true, force: true });
});

describe("runBudget: json output", () => {
  it("reports a single custom pass", async () => {
    const code = await runBudget({ input, project, maxTokens: "100", format: "json" });
    expect(code).toBe(0);

    const report = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(report.schemaVersion).toBe("1.0");
    expect(report.input).toEqual({ categories: 1, items: 3, tokens: 120, zone: "optimal" });
    expect(report.passes).toHaveLength(1);
    expect(report.passes[0].label).toBe("custom");
    expect(report.passes[0].report.totalTokens).toBe(100);
    expect(report.passes[0].report.selected.map((s: { id: string; truncated: boolean }) => [s.id, s.truncated])).toEqual([
      ["c1", false],
      ["c2", false],
      ["c3", true],
    ]);
  });

  it("runs every tier with --all-tiers", async () => {
    const code = await runBudget({ input, project, allTiers: true, format: "json" });
    expect(code).toBe(0);
    const report = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(report.passes.map((p: { label: string }) => p.label)).toEqual(["standard", "comprehensive", "full"]);
    expect(report.passes[0].report.maxTokens).toBe(4500);
  });

  it("uses the project config", async () => {
    fs.mkdirSync(path.join(project, ".docpack"));
    fs.writeFileSync(path.join(project, ".docpack", "config.json"), JSON.stringify({ maxTokens: 80 }));
    await runBudget({ input, project, format: "json" });
    const report = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(report.passes[0].label).toBe("custom");
    expect(report.passes[0].report.totalTokens).toBe(80);
  });

  it("lets --tier override a configured maxTokens", async () => {
    fs.mkdirSync(path.join(project, ".docpack"));
    fs.writeFileSync(path.join(project, ".docpack", "config.json"), JSON.stringify({ maxTokens: 80 }));
    await runBudget({ input, project, tier: "comprehensive", format: "json" });
    const report = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(report.passes[0].label).toBe("comprehensive");
    expect(report.passes[0].report.maxTokens).toBe(12_000);
  });

  it("writes the report to --output", async () => {
    const output = path.join(project, "report.json");
    await runBudget({ input, project, maxTokens: "100", output });
    const written = JSON.parse(fs.readFileSync(output, "utf-8"));
    expect(written.passes[0].report.maxTokens).toBe(100);
  });
});

describe("runBudget: text output", () => {
  it("prints the report table", async () => {
    const code = await runBudget({ input, project, maxTokens: "100" });
    expect(code).toBe(0);
    const output = logged();
    expect(output).toContain("Budget Report: custom");
    expect(output).toContain("100/100 tokens used");
    expect(output).toContain('Item "c3" truncated from 40 to 20 tokens');
  });

  it("logs engine warnings after the table with their codes", async () => {
    await runBudget({ input, project, maxTokens: "100" });
    const calls = vi.mocked(console.log).mock.calls.map((c) => c.map(String).join(" "));
    const table = calls.findIndex((line) => line.includes("Budget Report: custom"));
    const warning = calls.findIndex((line) => line.includes('Item "c3" truncated from 40 to 20 tokens'));
    expect(table).toBeGreaterThanOrEqual(0);
    expect(warning).toBeGreaterThan(table);
    expect(calls[warning]).toContain("[ITEM_TRUNCATED]");
  });
});

describe("runBudget: errors", () => {
  it("returns 1 for a nonexistent project directory", async () => {
    expect(await runBudget({ input, project: "/nonexistent/project" })).toBe(1);
    expect(errored()).toContain("project directory not found");
  });

  it("returns 2 for a missing content file", async () => {
    expect(await runBudget({ input: path.join(project, "missing.json"), project })).toBe(2);
    expect(errored()).toContain("Content file not found");
  });

  it("returns 2 for a non-positive budget", async () => {
    expect(await runBudget({ input, project, maxTokens: "0" })).toBe(2);
    expect(errored()).toContain("maxTokens must be a positive integer, got 0");
  });

  it("returns 2 for an unknown tier", async () => {
    expect(await runBudget({ input, project, tier: "huge" })).toBe(2);
    expect(errored()).toContain('Unknown tier "huge"');
  });

  it("returns 2 when --max-tokens is combined with --all-tiers", async () => {
    expect(await runBudget({ input, project, maxTokens: "100", allTiers: true })).toBe(2);
    expect(errored()).toContain("--max-tokens cannot be combined with --all-tiers");
  });

  it("returns 2 for an invalid config file", async () => {
    fs.mkdirSync(path.join(project, ".docpack"));
    fs.writeFileSync(path.join(project, ".docpack", "config.json"), "{");
    expect(await runBudget({ input, project })).toBe(2);
  });
});
