import "reflect-metadata";
import { container } from "tsyringe";
import { loadConfig } from "./config/app.config";
import { registerShiftCalendar, setupDI } from "./config/di.setup";
import { createApp } from "./http/app";
import { IComplianceMetrics } from "./services/compliance-metrics.interface";
import { ICsvProcessor } from "./services/csv-processor.interface";
import { IDashboardSession } from "./services/dashboard-session.interface";
import { ILoadTimeMetrics } from "./services/load-time-metrics.interface";
import { pinWallClockTimeZone } from "./utils/timestamp.util";

async function start() {
  const config = loadConfig();
  pinWallClockTimeZone();

  setupDI(config);
  await registerShiftCalendar();

  const app = createApp({
    session: container.resolve<IDashboardSession>("IDashboardSession"),
    csvProcessor: container.resolve<ICsvProcessor>("ICsvProcessor"),
    complianceMetrics: container.resolve<IComplianceMetrics>("IComplianceMetrics"),
    loadTimeMetrics: container.resolve<ILoadTimeMetrics>("ILoadTimeMetrics"),
  });

  app.listen(config.api.port, () => {
    console.log(`API Server running on http://localhost:${config.api.port}`);
    console.log(`Health check: http://localhost:${config.api.port}/health`);
  });
}

start().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
