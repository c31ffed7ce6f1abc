import { Command } from "commander";
import chalk from "chalk";
import { maybeOutputJson, reportError, toBinaryJson } from "../lib/json-output.js";
import {
  addResolverOptions,
  resolverOverrides,
  type ResolverFlags,
} from "../lib/options.js";
import { resolveBinary } from "../lib/resolver.js";
import {
  createServices,
  resolverOptions,
  type ServicesFactory,
  type ServicesHandle,
} from "../lib/runtime.js";

export function registerFetchCommand(
  program: Command,
  servicesFactory: ServicesFactory = createServices
): void {
  const command = program
    .command("fetch")
    .description("Download the CloudQuery binary for this platform and print its path");

  addResolverOptions(command)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  cqsync fetch                                 ${chalk.gray("Print the cached binary path")}
  cqsync fetch --cloudquery-version v6.5.0 --versioned-cache
  $(cqsync fetch -q) --version                 ${chalk.gray("Use the path in scripts")}
`
    )
    .action(async (options: ResolverFlags) => {
      await fetchCommand(options, servicesFactory);
    });
}

export async function fetchCommand(
  options: ResolverFlags,
  servicesFactory: ServicesFactory = createServices
): Promise<void> {
  let handle: ServicesHandle;
  try {
    handle = servicesFactory(resolverOverrides(options));
  } catch (error) {
    reportError(error);
    return;
  }

  const { services } = handle;

  try {
    const result = await resolveBinary(services.config.cloudqueryVersion, {
      ...resolverOptions(services),
      signal: services.signal,
      logger: services.logger,
    });

    if (!result.ok) {
      reportError(result.error, { step: "fetch" });
      return;
    }

    if (maybeOutputJson(toBinaryJson(result.value))) {
      return;
    }

    // Bare path on stdout so it can be captured by scripts
    console.log(result.value.path);
  } finally {
    handle.dispose();
  }
}
