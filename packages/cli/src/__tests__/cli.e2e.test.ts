/**
 * CLI E2E Tests
 *
 * Drives `runCli` end to end against a temporary project:
 * - argv → commander → command → engine → orchestrator → report
 * - exit codes for every terminal status and for usage errors
 * - approvals answered through a scripted terminal
 *
 * @module cli/__tests__/cli.e2e
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RunReport, WorkerInvoker, WorkerOutcomeInput } from "@phaseflow/core";
import type { WorkerDescriptor } from "@phaseflow/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { CliDeps } from "../commands/types.js";
import type { CliIO } from "../io.js";
import { runCli } from "../program.js";

// =============================================================================
// Test Fixtures
// =============================================================================

const REVIEW_WORKFLOW = `---
name: review
description: Review then document
phases:
  - id: review
    workers: [code-reviewer]
  - id: document
    workers:
      - worker: doc-writer
        advisory: true
---
`;

/**
 * Scripted terminal plus in-memory workers over a throwaway project.
 */
class CliHarness {
  readonly project: string;
  readonly home: string;
  readonly prompts: string[] = [];
  readonly answers: boolean[] = [];
  readonly outcomes = new Map<string, WorkerOutcomeInput>();
  readonly calls: string[] = [];
  private stdout = "";
  private stderr = "";

  constructor() {
    this.project = mkdtempSync(join(tmpdir(), "phaseflow-cli-project-"));
    this.home = mkdtempSync(join(tmpdir(), "phaseflow-cli-home-"));
  }

  get out(): string {
    return this.stdout;
  }

  get err(): string {
    return this.stderr;
  }

  writeProjectFile(relativePath: string, content: string): void {
    const filePath = join(this.project, relativePath);
    mkdirSync(join(filePath, ".."), { recursive: true });
    writeFileSync(filePath, content);
  }

  run(...argv: string[]): Promise<number> {
    const io: CliIO = {
      write: (text) => {
        this.stdout += text;
      },
      writeError: (text) => {
        this.stderr += text;
      },
      confirm: async (message) => {
        this.prompts.push(message);
        return this.answers.shift() ?? false;
      },
      colors: false,
    };
    const deps: CliDeps = {
      io,
      homeDir: this.home,
      env: {},
      logToConsole: false,
      invokerFor: (descriptor) => this.invoker(descriptor),
    };
    return runCli([...argv, "--cwd", this.project], deps);
  }

  report(): RunReport {
    return JSON.parse(this.stdout);
  }

  cleanup(): void {
    rmSync(this.project, { recursive: true, force: true });
    rmSync(this.home, { recursive: true, force: true });
  }

  /** Succeeds with every declared output unless an outcome was set */
  private invoker(descriptor: WorkerDescriptor): WorkerInvoker {
    const produced = Object.fromEntries(descriptor.outputContract.map((output) => [output.field, true]));
    return async () => {
      this.calls.push(descriptor.id);
      return this.outcomes.get(descriptor.id) ?? { status: "Success", producedFields: produced };
    };
  }
}

// =============================================================================
// run
// =============================================================================

describe("phaseflow run", () => {
  let harness: CliHarness;

  beforeEach(() => {
    harness = new CliHarness();
    harness.writeProjectFile(".phaseflow/workflows/review.md", REVIEW_WORKFLOW);
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("prints the report and exits 0 when every phase succeeds", async () => {
    const code = await harness.run("run", "review", "src/app.ts");

    expect(code).toBe(0);
    expect(harness.calls).toEqual(["code-reviewer", "doc-writer"]);
    expect(harness.out.split("\n").slice(1)).toEqual([
      "  ✔ review: Succeeded",
      "      code-reviewer: Success",
      "  ✔ document: Succeeded",
      "      doc-writer: Success",
      "Diagnostics: 0 critical, 0 high, 0 medium, 0 low",
      "Status: Succeeded (exit 0)",
      "",
    ]);
  });

  it("exits 2 when only an advisory worker fails", async () => {
    harness.outcomes.set("doc-writer", {
      status: "Failure",
      diagnostics: { error: { name: "DocsError", message: "no README" } },
    });

    const code = await harness.run("run", "review", "--json");

    expect(code).toBe(2);
    const report = harness.report();
    expect(report.status).toBe("PartiallyFailed");
    expect(report.exitCode).toBe(2);
    expect(report.phases[1]).toEqual({
      id: "document",
      status: "PartiallyFailed",
      iterations: 1,
      reason: "an advisory worker failed",
      workers: [{ id: "doc-writer", status: "Failure", error: "no README" }],
    });
  });

  it("exits 1 and skips later phases when a critical worker fails", async () => {
    harness.outcomes.set("code-reviewer", {
      status: "Failure",
      diagnostics: { error: { name: "ReviewError", message: "boom" } },
    });

    const code = await harness.run("run", "review");

    expect(code).toBe(1);
    expect(harness.calls).toEqual(["code-reviewer"]);
    expect(harness.out.split("\n").slice(1)).toEqual([
      "  ✖ review: Failed (a critical worker failed)",
      "      code-reviewer: Failure - boom",
      "  - document: Skipped (an earlier phase failed)",
      "Diagnostics: 0 critical, 0 high, 0 medium, 0 low",
      "Status: Failed (exit 1, phase-failed)",
      "",
    ]);
  });

  it("stops when an interactive approval is denied", async () => {
    harness.answers.push(false);

    const code = await harness.run("run", "review", "--interactive", "--json");

    expect(code).toBe(1);
    expect(harness.prompts).toEqual(['Phase "review" finished Succeeded. Continue?']);
    expect(harness.calls).toEqual(["code-reviewer"]);
    expect(harness.report().abortReason).toBe("approval-denied");
  });

  it("continues when an interactive approval is granted", async () => {
    harness.answers.push(true);

    const code = await harness.run("run", "review", "-i", "--json");

    expect(code).toBe(0);
    expect(harness.calls).toEqual(["code-reviewer", "doc-writer"]);
  });

  it("skips phases outside the focus", async () => {
    const code = await harness.run("run", "review", "--focus", "documentation", "--json");

    expect(code).toBe(0);
    expect(harness.calls).toEqual(["doc-writer"]);
    expect(harness.report().phases[0]).toEqual({
      id: "review",
      status: "Skipped",
      iterations: 0,
      reason: 'no worker matches focus "documentation"',
      workers: [],
    });
  });

  it("rejects an unknown workflow with a usage error", async () => {
    const code = await harness.run("run", "ghost");

    expect(code).toBe(64);
    expect(harness.err).toBe(
      'Unknown workflow "ghost". Run "phaseflow list" to see what is available.\n'
    );
    expect(harness.out).toBe("");
  });

  it("rejects a non-numeric iteration cap", async () => {
    const code = await harness.run("run", "review", "--max-iterations", "0");

    expect(code).toBe(64);
    expect(harness.err).toContain("Expected a positive integer.");
    expect(harness.calls).toEqual([]);
  });

  it("reports an unreadable config file", async () => {
    harness.writeProjectFile("phaseflow.toml", "[orchestrator\n");

    const code = await harness.run("run", "review");

    expect(code).toBe(64);
    expect(harness.err.startsWith("Failed to parse TOML:")).toBe(true);
  });
});

// =============================================================================
// list
// =============================================================================

describe("phaseflow list", () => {
  let harness: CliHarness;

  beforeEach(() => {
    harness = new CliHarness();
    harness.writeProjectFile(".phaseflow/workflows/review.md", REVIEW_WORKFLOW);
    harness.writeProjectFile(
      "phaseflow.toml",
      '[workers.code-reviewer]\ncommand = "node"\nargs = ["review.js"]\n'
    );
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("lists built-in and project workflows with bound workers", async () => {
    const code = await harness.run("list", "--json");

    expect(code).toBe(0);
    const listing = JSON.parse(harness.out);
    expect(listing.workflows.map((workflow: { name: string }) => workflow.name)).toEqual([
      "api-first",
      "debug-loop",
      "full-stack-feature",
      "quality-sprint",
      "security-audit",
      "review",
    ]);
    expect(listing.workflows[5]).toEqual({
      name: "review",
      source: "project",
      description: "Review then document",
      phases: ["review", "document"],
    });
    expect(listing.workers).toContainEqual({
      id: "code-reviewer",
      capabilities: ["code-review", "quality"],
      bound: true,
    });
    expect(listing.workers).toContainEqual({
      id: "doc-writer",
      capabilities: ["documentation"],
      bound: false,
    });
  });

  it("prints a plain listing", async () => {
    await harness.run("list");

    const lines = harness.out.split("\n");
    expect(lines[0]).toBe("Workflows:");
    expect(lines).toContain("  review [project] - Review then document");
    expect(lines).toContain("Workers:");
    expect(lines).toContain("  doc-writer (documentation)");
  });
});

// =============================================================================
// trigger
// =============================================================================

describe("phaseflow trigger", () => {
  let harness: CliHarness;

  beforeEach(() => {
    harness = new CliHarness();
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("runs automatically triggered workers", async () => {
    const code = await harness.run("trigger", "error", "Unhandled exception in request handler", "--json");

    expect(code).toBe(0);
    expect(harness.prompts).toEqual([]);
    expect(harness.report().phases).toEqual([
      {
        id: "reaction",
        status: "Succeeded",
        iterations: 1,
        workers: [{ id: "debugger", status: "Success" }],
      },
    ]);
  });

  it("asks before running workers that need confirmation", async () => {
    harness.answers.push(true, false);

    const code = await harness.run("trigger", "file", "src/app.ts", "--json");

    expect(code).toBe(0);
    expect(harness.prompts).toEqual([
      "Run code-reviewer for this FileChanged event?",
      "Run typescript-pro for this FileChanged event?",
    ]);
    expect(harness.calls).toEqual(["code-reviewer"]);
  });

  it("skips the questions with --yes", async () => {
    const code = await harness.run("trigger", "file", "src/app.ts", "--yes", "--json");

    expect(code).toBe(0);
    expect(harness.prompts).toEqual([]);
    expect(harness.calls.sort()).toEqual(["code-reviewer", "typescript-pro"]);
  });

  it("runs the worker an explicit command names", async () => {
    const code = await harness.run("trigger", "command", "@doc-writer refresh the changelog", "--json");

    expect(code).toBe(0);
    expect(harness.calls).toEqual(["doc-writer"]);
  });

  it("reports when nothing matches", async () => {
    const code = await harness.run("trigger", "file", "notes.txt");

    expect(code).toBe(0);
    expect(harness.err).toBe("No worker selected.\n");
    expect(harness.out).toBe("");
  });

  it("rejects an explicit command naming no known worker", async () => {
    const code = await harness.run("trigger", "command", "@ghost do it");

    expect(code).toBe(64);
    expect(harness.err).toBe('Unknown worker: "ghost"\n');
  });

  it("rejects an unknown event kind", async () => {
    const code = await harness.run("trigger", "webhook", "x");

    expect(code).toBe(64);
    expect(harness.err).toContain("webhook");
  });
});
