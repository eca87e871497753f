#!/usr/bin/env node
import "reflect-metadata";
import * as path from "path";
import { mkdir } from "fs/promises";
import { container } from "tsyringe";
import { loadConfig } from "./config/app.config";
import { registerShiftCalendar, setupDI } from "./config/di.setup";
import { IComplianceMetrics } from "./services/compliance-metrics.interface";
import { ICsvProcessor } from "./services/csv-processor.interface";
import { IDashboardSession } from "./services/dashboard-session.interface";
import { ILoadTimeMetrics } from "./services/load-time-metrics.interface";
import { ALL_FILTER } from "./types/metrics.types";
import { isSuccess } from "./types/result.types";
import { COMPLIANCE_COLUMNS, LOAD_TIME_COLUMNS } from "./types/table.types";
import { pinWallClockTimeZone } from "./utils/timestamp.util";

const USAGE = "Usage: dwell-compliance <activity.csv> <orders.csv> <trailers.csv> [outputDir]";

async function main() {
  try {
    const [activityPath, ordersPath, trailersPath, outputArg] = process.argv.slice(2);

    if (!activityPath || !ordersPath || !trailersPath) {
      console.error(`Error: three input files are required\n${USAGE}`);
      process.exit(1);
    }

    const config = loadConfig();
    pinWallClockTimeZone();

    setupDI(config);
    await registerShiftCalendar();

    const csvProcessor = container.resolve<ICsvProcessor>("ICsvProcessor");
    const session = container.resolve<IDashboardSession>("IDashboardSession");

    // Read all three exports in full before cleaning
    const [activity, orders, trailers] = await Promise.all([
      csvProcessor.readTable(activityPath),
      csvProcessor.readTable(ordersPath),
      csvProcessor.readTable(trailersPath),
    ]);
    console.log(
      `Read ${activity.rows.length} activity, ${orders.rows.length} order and ${trailers.rows.length} trailer rows`,
    );

    const result = session.upload({ activity, orders, trailers });
    if (!isSuccess(result)) {
      console.error(result.message);
      process.exit(1);
    }

    const outputDir = outputArg || config.output.dir;
    await mkdir(outputDir, { recursive: true });

    const mergedPath = path.join(outputDir, "merged_data.csv");
    const loadTimesPath = path.join(outputDir, "load_times_data.csv");
    await csvProcessor.writeTable(mergedPath, result.data.compliance, COMPLIANCE_COLUMNS);
    await csvProcessor.writeTable(loadTimesPath, result.data.loadTimes, LOAD_TIME_COLUMNS);
    console.log(`Compliance table written to: ${mergedPath}`);
    console.log(`Load times written to: ${loadTimesPath}`);

    const complianceMetrics = container.resolve<IComplianceMetrics>("IComplianceMetrics");
    const loadTimeMetrics = container.resolve<ILoadTimeMetrics>("ILoadTimeMetrics");
    const breakdown = complianceMetrics.breakdown(result.data.compliance, {
      period: { kind: "ytd" },
      shift: ALL_FILTER,
    });
    const loadTimeSummary = loadTimeMetrics.summarize(result.data.loadTimes, {
      shift: ALL_FILTER,
      orderType: ALL_FILTER,
    });

    console.log("\nSummary (JSON):");
    console.log(
      JSON.stringify(
        {
          shipments: breakdown.totals,
          byCarrier: breakdown.byCarrier,
          dwellCategories: breakdown.dwellCategories,
          loadTimeComplianceRate: loadTimeSummary.complianceRate,
          loadTimeTargetMinutes: loadTimeSummary.targetMinutes,
        },
        null,
        2,
      ),
    );
    process.exit(0);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

main();
