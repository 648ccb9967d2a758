#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { applyLogging, runDaemon } from "./daemon.js";
import { describeError } from "./errors.js";
import { createSmtpTransport } from "./mailer.js";
import { planTimeslots } from "./planner.js";
import { createScheduleSource } from "./schedule-source.js";
import { describeStorage, validateStorage } from "./storage.js";
import { formatScheduleTable } from "./utils.js";

const program = new Command();
program
  .name("radio-recorder")
  .description("Records scheduled radio shows and emails hosts a download link")
  .version("0.1.0");

program
  .command("run")
  .description("Run the recorder until interrupted")
  .action(async () => {
    process.exitCode = await runDaemon();
  });

program
  .command("schedule")
  .description("Fetch the schedule and print the shows that would be recorded")
  .option("--count <n>", "Number of upcoming shows to request")
  .option("--json", "JSON output")
  .action(async (options: { count?: string; json?: boolean }) => {
    const config = loadConfig();
    applyLogging(config);
    const source = createScheduleSource({
      baseUrl: config.schedule.baseUrl,
      apiKey: config.schedule.apiKey,
      requestTimeoutMs: config.network.requestTimeoutMs
    });
    const count = options.count ? Number(options.count) : config.schedule.count;
    if (!Number.isInteger(count) || count <= 0) {
      throw new Error(`Invalid --count value: ${options.count}`);
    }

    const records = await source.fetchUpcoming(count);
    const slots = planTimeslots(records, new Set(), {
      now: new Date(),
      excludedCategories: config.schedule.excludedCategories,
      horizonMs:
        config.schedule.horizonHours === undefined
          ? undefined
          : config.schedule.horizonHours * 60 * 60 * 1000
    });

    if (options.json) {
      console.log(JSON.stringify(slots, null, 2));
      return;
    }
    if (slots.length === 0) {
      console.log("No shows to record.");
      return;
    }
    console.log(formatScheduleTable(slots, config.timeZone));
  });

program
  .command("check")
  .description("Validate configuration, storage access and the SMTP login")
  .action(async () => {
    const config = loadConfig();
    applyLogging(config);
    await validateStorage(config.storage);
    console.log(`storage ok: ${JSON.stringify(describeStorage(config.storage))}`);
    await createSmtpTransport(config.email).verify();
    console.log(`smtp ok: ${config.email.host}:${config.email.port} as ${config.email.address}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(JSON.stringify(describeError(error)));
  process.exitCode = 1;
});
