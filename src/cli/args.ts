export type Command =
  | {
      kind: "merge-branch";
      target: string;
      projectType?: string;
      dryRun: boolean;
      createPullRequest: boolean;
      updateIssue: boolean;
      yes: boolean;
    }
  | {
      kind: "cleanup-branches";
      substring: string;
      includeRemote: boolean;
      dryRun: boolean;
      yes: boolean;
    }
  | { kind: "topic-branches"; branch?: string }
  | { kind: "status" }
  | { kind: "issue"; key: string }
  | { kind: "auth" }
  | { kind: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface OptionSpec {
  flags?: string[];
  values?: string[];
}

interface SplitArgs {
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

function splitArgs(command: string, args: string[], spec: OptionSpec): SplitArgs {
  const flags = new Set<string>();
  const values = new Map<string, string>();
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (spec.values?.includes(name)) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
      if (value === undefined || value === "" || value.startsWith("--")) {
        throw new UsageError(`--${name} needs a value`);
      }
      values.set(name, value);
    } else if (spec.flags?.includes(name) && eq === -1) {
      flags.add(name);
    } else {
      throw new UsageError(`Unknown option for ${command}: ${arg}`);
    }
  }

  return { positionals, flags, values };
}

function expectPositionals(
  command: string,
  positionals: string[],
  names: string[],
  optional = 0,
): void {
  const required = names.length - optional;
  if (positionals.length < required) {
    throw new UsageError(`${command} needs <${names[positionals.length]}>`);
  }
  if (positionals.length > names.length) {
    throw new UsageError(
      `Unexpected argument for ${command}: ${positionals[names.length]}`,
    );
  }
}

/**
 * Parse `argv` (without the node and script entries). Throws UsageError.
 */
export function parseArgs(argv: string[]): Command {
  const [command, ...rest] = argv;

  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };

    case "merge-branch": {
      const { positionals, flags, values } = splitArgs(command, rest, {
        flags: ["dry-run", "no-pr", "no-issue", "yes"],
        values: ["project"],
      });
      expectPositionals(command, positionals, ["target"]);
      return {
        kind: command,
        target: positionals[0],
        projectType: values.get("project"),
        dryRun: flags.has("dry-run"),
        createPullRequest: !flags.has("no-pr"),
        updateIssue: !flags.has("no-issue"),
        yes: flags.has("yes"),
      };
    }

    case "cleanup-branches": {
      const { positionals, flags } = splitArgs(command, rest, {
        flags: ["include-remote", "dry-run", "yes"],
      });
      expectPositionals(command, positionals, ["substring"]);
      if (positionals[0].trim() === "") {
        throw new UsageError("cleanup-branches needs a non-empty <substring>");
      }
      return {
        kind: command,
        substring: positionals[0],
        includeRemote: flags.has("include-remote"),
        dryRun: flags.has("dry-run"),
        yes: flags.has("yes"),
      };
    }

    case "topic-branches": {
      const { positionals } = splitArgs(command, rest, {});
      expectPositionals(command, positionals, ["branch"], 1);
      return { kind: command, branch: positionals[0] };
    }

    case "issue": {
      const { positionals } = splitArgs(command, rest, {});
      expectPositionals(command, positionals, ["key"]);
      return { kind: command, key: positionals[0] };
    }

    case "status":
    case "auth": {
      const { positionals } = splitArgs(command, rest, {});
      expectPositionals(command, positionals, []);
      return { kind: command };
    }

    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
