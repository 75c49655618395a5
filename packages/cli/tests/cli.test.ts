/**
 * Tests for the CLI: argument parsing, exit codes and command output.
 */

import { describe, it, expect, vi } from "vitest";
import { OAuthClient, ExternalServiceError } from "@splitrelay/sdk";
import { ConfigError } from "@splitrelay/node";
import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  USAGE,
  UsageError,
  parseCommand,
  runCli,
} from "../src/cli.js";
import type { CliDeps } from "../src/cli.js";
import { DINNER, FakeLedger, RecordingOutput, forwardingService, scriptedModel } from "./fakes.js";

function cliDeps(overrides: Partial<CliDeps> & { ledger?: FakeLedger } = {}) {
  const out = new RecordingOutput();
  const ledger = overrides.ledger ?? new FakeLedger();
  const service = forwardingService(ledger, scriptedModel(DINNER, 0.9));
  const deps: CliDeps = {
    out,
    service: () => service,
    oauth: () => {
      throw new ConfigError("LEDGER_CLIENT_ID");
    },
    prompt: async () => "",
    ...overrides,
  };
  return { deps, out, ledger };
}

const FORWARD_ARGS = ["forward", "--subject", "Fwd: Dinner", "--body", "Dinner with John and Sarah, 45 dollars"];

// =============================================================================
// parseCommand
// =============================================================================

describe("parseCommand", () => {
  it("parses forward with every option", () => {
    expect(
      parseCommand([
        "forward",
        "--subject",
        "Fwd: Dinner",
        "--body",
        "Dinner, 45 dollars",
        "--sender",
        "mike@example.com",
        "--group-id",
        "42",
        "--dry-run",
      ]),
    ).toEqual({
      command: "forward",
      email: { subject: "Fwd: Dinner", body: "Dinner, 45 dollars", sender: "mike@example.com" },
      groupId: 42,
      dryRun: true,
    });
  });

  it("parses the simple commands", () => {
    expect(parseCommand(["whoami"])).toEqual({ command: "whoami" });
    expect(parseCommand(["friends"])).toEqual({ command: "friends" });
    expect(parseCommand(["groups"])).toEqual({ command: "groups" });
    expect(parseCommand(["auth"])).toEqual({ command: "auth" });
  });

  it("carries an access token given on the command line", () => {
    expect(parseCommand(["whoami", "--access-token", " test-token "])).toEqual({
      command: "whoami",
      accessToken: "test-token",
    });
    expect(parseCommand([...FORWARD_ARGS, "--access-token", "test-token"])).toMatchObject({
      command: "forward",
      accessToken: "test-token",
    });
  });

  it("treats --help as a command", () => {
    expect(parseCommand(["forward", "--help"])).toEqual({ command: "help" });
    expect(parseCommand(["-h"])).toEqual({ command: "help" });
  });

  it.each([
    [[], "No command given"],
    [["balance"], 'Unknown command "balance"'],
    [["whoami", "now"], 'Unexpected argument "now"'],
    [["forward", "--subject", "Dinner"], "forward needs --subject and --body"],
    [[...FORWARD_ARGS, "--group-id", "family"], '--group-id must be a positive integer, got "family"'],
    [[...FORWARD_ARGS, "--group-id", "0"], '--group-id must be a positive integer, got "0"'],
    [["friends", "--access-token", "  "], "--access-token must not be empty"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCommand(argv)).toThrow(new UsageError(message));
  });

  it("rejects unknown options", () => {
    expect(() => parseCommand(["whoami", "--verbose"])).toThrow(UsageError);
  });
});

// =============================================================================
// runCli
// =============================================================================

describe("runCli", () => {
  it("exits 2 and prints usage on a usage error", async () => {
    const { deps, out } = cliDeps();

    expect(await runCli(["balance"], deps)).toBe(EXIT_USAGE);
    expect(out.errors).toEqual(['  ✗ Unknown command "balance"', USAGE]);
  });

  it("prints help", async () => {
    const { deps, out } = cliDeps();

    expect(await runCli(["--help"], deps)).toBe(EXIT_OK);
    expect(out.lines).toEqual([USAGE]);
  });

  it("shows the authenticated user", async () => {
    const { deps, out } = cliDeps();

    expect(await runCli(["whoami"], deps)).toBe(EXIT_OK);
    expect(out.lines).toEqual(["  ✓ Mike Jones <mike@example.com> (id 100)"]);
  });

  it("passes a command-line access token to the service", async () => {
    const { deps: base } = cliDeps();
    const service = vi.fn(base.service);
    const { deps, out } = cliDeps({ service });

    expect(await runCli(["whoami", "--access-token", "test-token"], deps)).toBe(EXIT_OK);
    expect(service).toHaveBeenCalledWith({ accessToken: "test-token" });
    expect(out.lines).toEqual(["  ✓ Mike Jones <mike@example.com> (id 100)"]);
  });

  it("builds the service without overrides by default", async () => {
    const { deps: base } = cliDeps();
    const service = vi.fn(base.service);
    const { deps } = cliDeps({ service });

    await runCli(["groups"], deps);

    expect(service).toHaveBeenCalledWith({});
  });

  it("lists friends", async () => {
    const { deps, out } = cliDeps();

    await runCli(["friends"], deps);

    expect(out.lines).toEqual([
      "",
      "  Friends (2)",
      "    → 201           John Smith <john@example.com>",
      "    → 202           Sarah",
    ]);
  });

  it("lists groups", async () => {
    const { deps, out } = cliDeps();

    await runCli(["groups"], deps);

    expect(out.lines).toEqual(["", "  Groups (1)", "    → 42            Flatmates (3 members)"]);
  });

  it("forwards an email and prints the created expense", async () => {
    const { deps, out, ledger } = cliDeps();

    expect(await runCli(FORWARD_ARGS, deps)).toBe(EXIT_OK);

    expect(out.lines).toEqual([
      "",
      "  Fwd: Dinner",
      "    → confidence    0.90",
      "    → description   Dinner at Luigi's",
      "    → cost          45.00 USD",
      "    → date          2024-03-15",
      "    → category      12",
      "    → user 100      paid 45.00, owes 15.00",
      "    → user 201      paid 0.00, owes 15.00",
      "    → user 202      paid 0.00, owes 15.00",
      "  ✓ Expense 5000 created",
    ]);
    expect(ledger.submitted).toHaveLength(1);
  });

  it("previews without submitting on --dry-run", async () => {
    const { deps, out, ledger } = cliDeps();

    expect(await runCli([...FORWARD_ARGS, "--dry-run"], deps)).toBe(EXIT_OK);

    expect(out.lines.at(-1)).toBe("  ✓ Dry run: nothing submitted");
    expect(ledger.submitted).toEqual([]);
  });

  it("prints conversion warnings", async () => {
    const ledger = new FakeLedger();
    const service = forwardingService(
      ledger,
      scriptedModel({ ...DINNER, participants: ["John", "Zed"] }, 0.8, { summary: "Dinner with John" }),
    );
    const { deps, out } = cliDeps({ ledger, service: () => service });

    await runCli(FORWARD_ARGS, deps);

    expect(out.lines[1]).toBe("  Dinner with John");
    expect(out.lines).toContain('  ! No friend matches participant "Zed"; left out of the split');
  });

  it("exits 1 when the extraction is not confident enough", async () => {
    const service = forwardingService(
      new FakeLedger(),
      scriptedModel(DINNER, 0.3, { notes: "No amount in the email" }),
    );
    const { deps, out } = cliDeps({ service: () => service });

    expect(await runCli(FORWARD_ARGS, deps)).toBe(EXIT_FAILURE);

    expect(out.lines).toEqual(["", "  Fwd: Dinner", "    → confidence    0.30", "  ! No amount in the email"]);
    expect(out.errors).toEqual(["  ✗ Confidence is below 0.5; nothing submitted"]);
  });

  it("exits 1 with the error code when the ledger fails", async () => {
    const ledger = new FakeLedger();
    ledger.submitError = new ExternalServiceError("SERVER_ERROR", "HTTP 503 after 4 attempts", 503);
    const { deps, out } = cliDeps({ ledger });

    expect(await runCli(FORWARD_ARGS, deps)).toBe(EXIT_FAILURE);
    expect(out.errors).toEqual(["  ✗ HTTP 503 after 4 attempts (SERVER_ERROR)"]);
  });
});

// =============================================================================
// auth
// =============================================================================

describe("runCli auth", () => {
  function oauthClient() {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      new Response(JSON.stringify({ access_token: "test-token", token_type: "bearer" }), {
        status: 200,
        headers: { "content-type": "application/json" },
      }),
    );
    const client = new OAuthClient({
      clientId: "test-client",
      clientSecret: "test-secret",
      redirectUri: "http://localhost:8080/callback",
      authUrl: "https://ledger.example.com/oauth/authorize",
      tokenUrl: "https://ledger.example.com/oauth/token",
      fetchFn,
    });
    return { client, fetchFn };
  }

  /** Answers the prompt with a callback for the URL the command printed. */
  function callbackFor(out: RecordingOutput, state?: string): () => Promise<string> {
    return async () => {
      const printed = out.lines.find((line) => line.trim().startsWith("https://"));
      const url = new URL(String(printed).trim());
      return `http://localhost:8080/callback?code=test-code&state=${state ?? url.searchParams.get("state")}`;
    };
  }

  it("exchanges the pasted callback for an access token", async () => {
    const out = new RecordingOutput();
    const { client, fetchFn } = oauthClient();
    const { deps } = cliDeps({ out, oauth: () => client, prompt: callbackFor(out) });

    expect(await runCli(["auth"], deps)).toBe(EXIT_OK);

    expect(new URLSearchParams(String(fetchFn.mock.calls[0]?.[1]?.body)).get("code")).toBe("test-code");
    expect(out.lines.slice(-3)).toEqual([
      "  ✓ Authorized",
      "    → access token  test-token",
      "  Add LEDGER_ACCESS_TOKEN=test-token to your .env file.",
    ]);
  });

  it("exits 1 when the callback state does not match", async () => {
    const out = new RecordingOutput();
    const { client, fetchFn } = oauthClient();
    const { deps } = cliDeps({ out, oauth: () => client, prompt: callbackFor(out, "forged") });

    expect(await runCli(["auth"], deps)).toBe(EXIT_FAILURE);

    expect(out.errors).toEqual([
      "  ✗ Callback state does not match the authorization request (AUTHORIZATION_DENIED)",
    ]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("exits 1 naming the missing credential", async () => {
    const { deps, out } = cliDeps();

    expect(await runCli(["auth"], deps)).toBe(EXIT_FAILURE);
    expect(out.errors).toEqual([
      "  ✗ LEDGER_CLIENT_ID is not set. Add it to the environment or the .env file. (CONFIG_MISSING)",
    ]);
  });
});
