#!/usr/bin/env node
/**
 * erpsync CLI - Main entry point
 */

import { Command, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import { describeError, type RecordEdit, type RecordFilter } from "@erpsync/core";
import { loadConfigFile } from "./parser.js";
import { createContextFromFile, withContext, type ContextOverrides } from "./runner.js";

const DEFAULT_CONFIG = "erpsync.jsonc";

/**
 * Where command output goes. Tests replace it to capture lines and exit codes.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  exit(code: number): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  exit: (code) => {
    process.exitCode = code;
  },
};

interface ConfigOption {
  config: string;
}

interface FieldOptions extends ConfigOption {
  subject?: string;
  originator?: string;
  status?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

function parseFilter(value: string): RecordFilter {
  if (value === "all" || value === "unsynced" || value === "synced") {
    return value;
  }
  throw new InvalidArgumentError("must be one of all, unsynced, synced");
}

function toEdit(options: FieldOptions): RecordEdit {
  const edit: RecordEdit = {};
  if (options.subject !== undefined) edit.subject = options.subject;
  if (options.originator !== undefined) edit.originator = options.originator;
  if (options.status !== undefined) edit.status = options.status;
  return edit;
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Build the command tree. `overrides` replace configured drivers.
 */
export function createProgram(io: CliIO = consoleIO, overrides: ContextOverrides = {}): Command {
  const program = new Command();

  const run = async (action: () => Promise<number | void>): Promise<void> => {
    try {
      const code = await action();
      io.exit(code ?? 0);
    } catch (error) {
      io.err(`Error: ${describeError(error)}`);
      io.exit(1);
    }
  };

  const withConfig = (command: Command): Command =>
    command.option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG);

  program
    .name("erpsync")
    .description("Keeps a local record store and an ERP resource endpoint in sync")
    .version("0.1.0");

  withConfig(program.command("serve"))
    .description("Run outbound passes on the configured interval until interrupted")
    .action((options: ConfigOption) =>
      run(async () => {
        const context = await createContextFromFile(options.config, overrides);
        const stopped = new Promise<string>((resolve) => {
          process.once("SIGINT", () => resolve("SIGINT"));
          process.once("SIGTERM", () => resolve("SIGTERM"));
        });
        context.scheduler.start();
        io.out(
          `Outbound sync every ${context.config.outbound.intervalMinutes} minute(s). Press Ctrl+C to stop.`
        );
        const signal = await stopped;
        context.logger.info({ signal }, "Shutting down");
        await context.close();
      })
    );

  withConfig(program.command("push"))
    .description("Run one outbound pass")
    .action((options: ConfigOption) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            const synced = await lifecycle.runOutboundPass();
            io.out(`Synced ${synced} record(s)`);
          },
          overrides
        )
      )
    );

  withConfig(program.command("pull"))
    .description("Run one inbound pass")
    .option("--batch-size <n>", "Records per page", parsePositiveInt)
    .option("--max-records <n>", "Upper bound on records fetched", parsePositiveInt)
    .action((options: ConfigOption & { batchSize?: number; maxRecords?: number }) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle, config }) => {
            const report = await lifecycle.runInboundPass({
              batchSize: options.batchSize ?? config.inbound.batchSize,
              maxRecords: options.maxRecords ?? config.inbound.maxRecords,
            });
            io.out(json(report));
            return report.failedRanges.length > 0 ? 1 : 0;
          },
          overrides
        )
      )
    );

  withConfig(program.command("submit"))
    .description("Store a new record and try to push it immediately")
    .requiredOption("--subject <text>", "Record subject")
    .option("--originator <id>", "Who raised the record")
    .option("--status <status>", "Initial status (default: Open)")
    .action((options: FieldOptions & { subject: string }) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            io.out(json(await lifecycle.submit(options)));
          },
          overrides
        )
      )
    );

  withConfig(program.command("create-local"))
    .description("Store a new pending record without contacting the ERP")
    .requiredOption("--subject <text>", "Record subject")
    .option("--originator <id>", "Who raised the record")
    .option("--status <status>", "Initial status (default: Open)")
    .action((options: FieldOptions & { subject: string }) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            io.out(json(await lifecycle.createLocal(options)));
          },
          overrides
        )
      )
    );

  withConfig(program.command("get"))
    .description("Show one record")
    .argument("<localId>", "Local record identifier")
    .action((localId: string, options: ConfigOption) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            io.out(json(await lifecycle.get(localId)));
          },
          overrides
        )
      )
    );

  withConfig(program.command("list"))
    .description("List records")
    .option("--filter <filter>", "all, unsynced or synced", parseFilter, "all")
    .action((options: ConfigOption & { filter: RecordFilter }) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            io.out(json(await lifecycle.list(options.filter)));
          },
          overrides
        )
      )
    );

  withConfig(program.command("update"))
    .description("Edit a record and mirror the edit to the ERP when possible")
    .argument("<localId>", "Local record identifier")
    .option("--subject <text>", "New subject")
    .option("--originator <id>", "New originator")
    .option("--status <status>", "New status")
    .action((localId: string, options: FieldOptions) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            io.out(json(await lifecycle.update(localId, toEdit(options))));
          },
          overrides
        )
      )
    );

  withConfig(program.command("delete"))
    .description("Delete a record locally and, best effort, in the ERP")
    .argument("<localId>", "Local record identifier")
    .action((localId: string, options: ConfigOption) =>
      run(() =>
        withContext(
          options.config,
          async ({ lifecycle }) => {
            io.out(json(await lifecycle.delete(localId)));
          },
          overrides
        )
      )
    );

  withConfig(program.command("purge"))
    .description("Delete every local record (the ERP is not touched)")
    .option("--yes", "Confirm the purge")
    .action((options: ConfigOption & { yes?: boolean }) =>
      run(async () => {
        if (!options.yes) {
          io.err("Refusing to purge without --yes");
          return 1;
        }
        return withContext(
          options.config,
          async ({ lifecycle }) => {
            const count = await lifecycle.purgeLocal();
            io.out(`Deleted ${count} local record(s)`);
          },
          overrides
        );
      })
    );

  withConfig(program.command("health"))
    .description("Check that the store and the ERP endpoint are reachable")
    .action((options: ConfigOption) =>
      run(() =>
        withContext(
          options.config,
          async ({ store, remote }) => {
            const status = { store: await store.ping(), remote: await remote.ping() };
            io.out(json(status));
            return status.store && status.remote ? 0 : 1;
          },
          overrides
        )
      )
    );

  withConfig(program.command("validate"))
    .description("Validate a configuration file without connecting")
    .action((options: ConfigOption) =>
      run(async () => {
        const config = await loadConfigFile(options.config);
        io.out(`Configuration is valid: ${options.config}`);
        io.out(`  Store: ${config.store.driver}`);
        io.out(`  Remote: ${config.remote.driver}`);
        io.out(`  Outbound interval: ${config.outbound.intervalMinutes} minute(s)`);
        io.out(
          `  Inbound: batch ${config.inbound.batchSize}, max ${config.inbound.maxRecords} record(s)`
        );
      })
    );

  return program;
}

if (require.main === module) {
  loadDotenv();
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
