#!/usr/bin/env node

import { Command } from "commander";
import process from "process";
import { lightColors } from "./utils/colors.js";
import { lazyModules } from "./utils/lazy-loader.js";
import { formatVersion, readPackageInfo } from "./utils/package-info.js";

const program = new Command();

program
  .name("git-cc")
  .description("📝 Interactive Conventional Commits for git")
  .version(formatVersion(readPackageInfo()), "-v, --version", "Show version information")
  .option("-d, --dry-run", "Show the commit message without committing")
  .allowExcessArguments(false)
  .action(async (options: { dryRun?: boolean }): Promise<void> => {
    const { withErrorHandling } = await lazyModules.errorHandler();
    await withErrorHandling(
      async (): Promise<void> => {
        const { GitCc } = await lazyModules.gitCc();
        await new GitCc().commit({ dryRun: options.dryRun });
      },
      { operation: "commit" }
    );
  });

program
  .command("config")
  .description("Show the resolved commit types and scopes")
  .action(async (): Promise<void> => {
    const { withErrorHandling } = await lazyModules.errorHandler();
    await withErrorHandling(
      async (): Promise<void> => {
        const { GitCc } = await lazyModules.gitCc();
        await new GitCc().showConfig();
      },
      { operation: "config" }
    );
  });

program
  .command("reset")
  .description("Discard the answers saved from an interrupted run")
  .option("-y, --yes", "Do not ask for confirmation")
  .action(async (options: { yes?: boolean }): Promise<void> => {
    const { withErrorHandling } = await lazyModules.errorHandler();
    await withErrorHandling(
      async (): Promise<void> => {
        const { GitCc } = await lazyModules.gitCc();
        await new GitCc().reset(options.yes ?? false);
      },
      { operation: "reset" }
    );
  });

program
  .command("help-examples")
  .description("Show usage examples")
  .action(async (): Promise<void> => {
    const { default: gradient } = await lazyModules.gradientString();
    console.log(`${gradient(["#a8edea", "#fed6e3"])("📚 git-cc Usage Examples:\n")}

${lightColors.yellow("Committing:")}
  git cc                         # Answer the questionnaire and commit
  git cc --dry-run               # Preview the message without committing

${lightColors.yellow("Sessions:")}
  git cc reset                   # Discard answers kept from an interrupted run
  git cc reset --yes             # Same, without confirmation

${lightColors.yellow("Configuration (.git-cc.yaml in the repository root):")}
  use_defaults: true             # Offer feat, fix, build, chore, ci, docs, refactor, test
  custom_commit_types: [perf]    # Extra commit types
  scopes: [api, cli]             # Offer scopes as a list instead of free text
  git cc config                  # Show what will be offered

${lightColors.yellow("Environment:")}
  DEBUG=true git cc              # Verbose diagnostics
  SCOPES="api cli" git cc        # Override configured scopes`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(lightColors.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
});
