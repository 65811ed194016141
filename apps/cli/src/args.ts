export type McpCommandArgs = {
  projectName?: string;
  pushExplorer: boolean;
  command: string;
  argv: string[];
};

export class UsageError extends Error {
  readonly code = "usage_error" as const;
}

/**
 * `mcp --project-name <name> [--push-explorer] --exec <cmd> [args...]`.
 * Everything after `--exec` belongs to the child, flags included.
 */
export function parseMcpArgs(argv: readonly string[]): McpCommandArgs {
  let projectName: string | undefined;
  let pushExplorer = false;

  let i = 0;
  for (; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--exec") break;

    if (a === "--push-explorer") {
      pushExplorer = true;
    } else if (a === "--project-name") {
      const v = argv[i + 1];
      if (!v || v.startsWith("--")) throw new UsageError("--project-name needs a value");
      projectName = v;
      i++;
    } else if (a.startsWith("--project-name=")) {
      projectName = a.slice("--project-name=".length) || undefined;
    } else {
      throw new UsageError(`Unknown option: ${a}`);
    }
  }

  const rest = argv.slice(i + 1);
  if (i >= argv.length || !rest.length) throw new UsageError("Missing --exec <command> [args...]");
  if (pushExplorer && !projectName) throw new UsageError("--push-explorer requires --project-name");

  const [command, ...childArgv] = rest;
  return { projectName, pushExplorer, command, argv: childArgv };
}
