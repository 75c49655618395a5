/**
 * @splitrelay/cli — Command dispatch.
 *
 * runCli() parses the arguments, runs one command and resolves to the
 * process exit code. Clients are built lazily through CliDeps, so a
 * missing credential only fails the commands that need it.
 */

import { parseArgs } from "node:util";
import type { Identity, SubmissionRecord } from "@splitrelay/types";
import { displayName } from "@splitrelay/converter";
import type { ConversionWarning } from "@splitrelay/converter";
import type { OAuthClient } from "@splitrelay/sdk";
import type { ForwardingService } from "@splitrelay/node";
import type { Output } from "./output.js";
import { fail, heading, info, ok, warn } from "./output.js";

// =============================================================================
// Exit Codes
// =============================================================================

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: splitrelay <command> [options]

Commands:
  auth                     Authorize with the ledger and print an access token
  whoami                   Show the authenticated user
  friends                  List your friends
  groups                   List your groups
  forward                  Turn an expense email into a ledger expense
    --subject <text>       Email subject (required)
    --body <text>          Email body (required)
    --sender <address>     Email sender
    --group-id <id>        Group to file the expense in
    --dry-run              Show the expense without submitting it

Options:
  --access-token <token>   Use this ledger token instead of LEDGER_ACCESS_TOKEN
  -h, --help               Show this help`;

// =============================================================================
// Dependencies
// =============================================================================

/** Per-run settings that take precedence over the environment. */
export interface ServiceOverrides {
  readonly accessToken?: string;
}

export interface CliDeps {
  readonly out: Output;
  readonly service: (overrides: ServiceOverrides) => ForwardingService;
  readonly oauth: () => OAuthClient;
  /** Ask the user for one line of input */
  readonly prompt: (question: string) => Promise<string>;
}

// =============================================================================
// Argument Parsing
// =============================================================================

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ForwardCommand extends ServiceOverrides {
  readonly command: "forward";
  readonly email: { readonly subject: string; readonly body: string; readonly sender?: string };
  readonly groupId?: number;
  readonly dryRun: boolean;
}

export type ParsedCommand =
  | { readonly command: "help" }
  | ({ readonly command: "auth" | "whoami" | "friends" | "groups" } & ServiceOverrides)
  | ForwardCommand;

const SIMPLE_COMMANDS = ["auth", "whoami", "friends", "groups"] as const;

function isSimpleCommand(name: string): name is (typeof SIMPLE_COMMANDS)[number] {
  return SIMPLE_COMMANDS.some((command) => command === name);
}

function isParseArgsError(error: unknown): error is TypeError {
  return (
    error instanceof TypeError &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  );
}

function parseGroupId(raw: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value <= 0) {
    throw new UsageError(`--group-id must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        subject: { type: "string" },
        body: { type: "string" },
        sender: { type: "string" },
        "group-id": { type: "string" },
        "dry-run": { type: "boolean" },
        "access-token": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

/**
 * @throws {UsageError} for unknown commands or options, and missing or malformed values
 */
export function parseCommand(argv: readonly string[]): ParsedCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help === true) {
    return { command: "help" };
  }

  const [name, ...extra] = positionals;
  if (name === undefined) {
    throw new UsageError("No command given");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument "${extra.join(" ")}"`);
  }

  const rawToken = values["access-token"];
  const accessToken = rawToken?.trim();
  if (accessToken === "") {
    throw new UsageError("--access-token must not be empty");
  }
  const overrides = accessToken !== undefined ? { accessToken } : {};

  if (isSimpleCommand(name)) {
    return { command: name, ...overrides };
  }
  if (name !== "forward") {
    throw new UsageError(`Unknown command "${name}"`);
  }

  const { subject, body, sender } = values;
  if (subject === undefined || body === undefined) {
    throw new UsageError("forward needs --subject and --body");
  }
  const groupId = values["group-id"];

  return {
    command: "forward",
    email: { subject, body, ...(sender !== undefined ? { sender } : {}) },
    ...(groupId !== undefined ? { groupId: parseGroupId(groupId) } : {}),
    dryRun: values["dry-run"] === true,
    ...overrides,
  };
}

// =============================================================================
// Formatting
// =============================================================================

function describeIdentity(identity: Identity): string {
  const name = displayName(identity);
  return identity.email !== undefined ? `${name} <${identity.email}>` : name;
}

function printRecord(out: Output, record: SubmissionRecord): void {
  info(out, "description", record.description);
  info(out, "cost", `${record.cost} ${record.currencyCode}`);
  if (record.date !== undefined) {
    info(out, "date", record.date.slice(0, 10));
  }
  if (record.categoryId !== undefined) {
    info(out, "category", String(record.categoryId));
  }
  if (record.groupId !== undefined) {
    info(out, "group", String(record.groupId));
  }
  for (const line of record.shares) {
    info(out, `user ${line.userId}`, `paid ${line.paidShare}, owes ${line.owedShare}`);
  }
}

function printWarnings(out: Output, warnings: readonly ConversionWarning[]): void {
  for (const warning of warnings) {
    warn(out, warning.message);
  }
}

function reportError(out: Output, error: unknown): void {
  if (!(error instanceof Error)) {
    fail(out, String(error));
    return;
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  fail(out, code !== undefined ? `${error.message} (${code})` : error.message);
}

// =============================================================================
// Commands
// =============================================================================

async function auth(deps: CliDeps): Promise<number> {
  const { out } = deps;
  const oauth = deps.oauth();
  const { url, state } = oauth.authorizationUrl();

  heading(out, "Authorize splitrelay");
  out.line("  Open this URL in your browser and approve access:");
  out.line(`  ${url}`);
  out.line();

  const callbackUrl = await deps.prompt("  Paste the URL you were redirected to: ");
  const code = oauth.extractAuthorizationCode(callbackUrl, state);
  const token = await oauth.exchangeCode(code);

  ok(out, "Authorized");
  info(out, "access token", token.accessToken);
  out.line(`  Add LEDGER_ACCESS_TOKEN=${token.accessToken} to your .env file.`);
  return EXIT_OK;
}

function serviceFor(command: ServiceOverrides, deps: CliDeps): ForwardingService {
  return deps.service(command.accessToken !== undefined ? { accessToken: command.accessToken } : {});
}

async function whoami(command: ServiceOverrides, deps: CliDeps): Promise<number> {
  const user = await serviceFor(command, deps).principal();
  ok(deps.out, `${describeIdentity(user)} (id ${user.id})`);
  return EXIT_OK;
}

async function friends(command: ServiceOverrides, deps: CliDeps): Promise<number> {
  const list = await serviceFor(command, deps).friends();
  heading(deps.out, `Friends (${list.length})`);
  for (const friend of list) {
    info(deps.out, String(friend.id), describeIdentity(friend));
  }
  return EXIT_OK;
}

async function groups(command: ServiceOverrides, deps: CliDeps): Promise<number> {
  const list = await serviceFor(command, deps).groups();
  heading(deps.out, `Groups (${list.length})`);
  for (const group of list) {
    info(deps.out, String(group.id), `${group.name} (${group.memberIds.length} members)`);
  }
  return EXIT_OK;
}

async function forward(command: ForwardCommand, deps: CliDeps): Promise<number> {
  const { out } = deps;
  const outcome = await serviceFor(command, deps).forwardEmail(command.email, {
    groupId: command.groupId,
    dryRun: command.dryRun,
  });

  const { confidence, summary, notes } = outcome.extraction;
  heading(out, summary ?? command.email.subject);
  info(out, "confidence", confidence.toFixed(2));

  switch (outcome.status) {
    case "submitted":
      printRecord(out, outcome.record);
      printWarnings(out, outcome.warnings);
      ok(out, `Expense ${outcome.expenseId} created`);
      return EXIT_OK;

    case "previewed":
      printRecord(out, outcome.record);
      printWarnings(out, outcome.warnings);
      ok(out, "Dry run: nothing submitted");
      return EXIT_OK;

    case "blocked":
      printRecord(out, outcome.record);
      printWarnings(out, outcome.warnings);
      fail(out, `Blocked: ${outcome.error.message}`);
      return EXIT_FAILURE;

    case "low-confidence":
      if (notes !== undefined) {
        warn(out, notes);
      }
      fail(out, `Confidence is below ${outcome.minConfidence}; nothing submitted`);
      return EXIT_FAILURE;
  }
}

// =============================================================================
// Entry
// =============================================================================

function dispatch(command: ParsedCommand, deps: CliDeps): Promise<number> {
  switch (command.command) {
    case "help":
      deps.out.line(USAGE);
      return Promise.resolve(EXIT_OK);
    case "auth":
      return auth(deps);
    case "whoami":
      return whoami(command, deps);
    case "friends":
      return friends(command, deps);
    case "groups":
      return groups(command, deps);
    case "forward":
      return forward(command, deps);
  }
}

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      fail(deps.out, error.message);
      deps.out.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  try {
    return await dispatch(command, deps);
  } catch (error) {
    reportError(deps.out, error);
    return EXIT_FAILURE;
  }
}
