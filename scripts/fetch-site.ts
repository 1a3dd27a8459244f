#!/usr/bin/env tsx

/**
 * Walk through every endpoint for one site and print the results
 *
 * Usage:
 *   npm run fetch-site -- --api-key <key> --site <id>
 *   SOLAREDGE_API_KEY=... SOLAREDGE_SITE_ID=... npm run fetch-site
 *
 * Values can also come from a .env file.
 */

import "dotenv/config";
import { Command } from "commander";
import { now, toCalendarDate, toCalendarDateTime } from "@internationalized/date";
import {
  SolarEdgeClient,
  SolarEdgeError,
  TimeUnit,
  createConsoleLogger,
  formatQuantityText,
  formatSiteDateTime,
  pollDelay,
} from "../lib";

interface Options {
  apiKey?: string;
  site?: string;
  timeZone?: string;
  trace: boolean;
}

async function main() {
  const program = new Command()
    .name("fetch-site")
    .description("Fetch sites, details, overview, energy and power from the SolarEdge monitoring API")
    .option("--api-key <key>", "API key (default: $SOLAREDGE_API_KEY)")
    .option("--site <id>", "Site id (default: $SOLAREDGE_SITE_ID)")
    .option("--time-zone <zone>", "Site time zone (default: taken from the site details)")
    .option("--trace", "Log request URLs and raw response bodies", false)
    .parse();

  const options = program.opts<Options>();
  const apiKey = options.apiKey ?? process.env.SOLAREDGE_API_KEY ?? "";
  const siteId = Number(options.site ?? process.env.SOLAREDGE_SITE_ID);
  const logger = createConsoleLogger({ level: options.trace ? "trace" : "info" });

  if (!apiKey || !Number.isInteger(siteId)) {
    program.help({ error: true });
  }

  console.log("=".repeat(60));
  console.log(`SolarEdge site ${siteId}`);
  console.log("=".repeat(60));

  console.log("\nSites of this account:");
  const lookupClient = new SolarEdgeClient({ logger, timeZone: options.timeZone });
  const list = await lookupClient.listSites(apiKey);
  for (const site of list.sites) {
    console.log(`  ${site.id}\t${site.name}`);
  }

  const details = await lookupClient.getSiteDetails(apiKey, siteId);
  const timeZone = options.timeZone ?? details.location.timeZone;
  const client = new SolarEdgeClient({ logger, timeZone });

  console.log("\nDetails:");
  console.log(`  Name:       ${details.name}`);
  console.log(`  Status:     ${details.status}`);
  console.log(`  Peak power: ${formatQuantityText(details.peakPower)}`);
  console.log(`  Time zone:  ${timeZone}`);

  const period = await client.getDataPeriod(apiKey, siteId);
  console.log(
    `\nData available from ${period.startDate?.toString() ?? "—"} until ${period.endDate?.toString() ?? "—"}`,
  );

  const overview = await client.getOverview(apiKey, siteId);
  console.log("\nOverview:");
  console.log(`  Last update:   ${formatSiteDateTime(overview.lastUpdateTime)}`);
  console.log(`  Current power: ${formatQuantityText(overview.currentPower)}`);
  console.log(`  Today:         ${formatQuantityText(overview.lastDayData.energy)}`);
  console.log(`  Lifetime:      ${formatQuantityText(overview.lifeTimeData.energy)}`);

  const estimate = overview.estimatedNextUpdate();
  console.log(
    `  Next update:   ${formatSiteDateTime(estimate.nextUpdate)} (poll in ${Math.round(pollDelay(estimate) / 1000)}s)`,
  );

  const current = now(timeZone);
  const today = toCalendarDate(current);
  const localNow = toCalendarDateTime(current);

  console.log("\nEnergy per hour today:");
  const energy = await client.getEnergy(
    apiKey,
    siteId,
    { startDate: today, endDate: today },
    TimeUnit.HOUR,
  );
  for (const reading of energy.values) {
    console.log(`  ${formatSiteDateTime(reading.date)}  ${formatQuantityText(reading.value)}`);
  }

  console.log("\nPower over the past hour:");
  const power = await client.getPower(apiKey, siteId, {
    startTime: localNow.subtract({ hours: 1 }),
    endTime: localNow,
  });
  for (const reading of power.values) {
    console.log(`  ${formatSiteDateTime(reading.date)}  ${formatQuantityText(reading.value)}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof SolarEdgeError) {
    console.error(`❌ ${error.name} (${error.kind}): ${error.message}`);
  } else {
    console.error("❌ Unexpected error:", error);
  }
  process.exit(1);
});
