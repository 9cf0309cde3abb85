export { ReportsModule } from "./reports.module";
export { ReportsService } from "./service/reports.service";
export { ReportsController } from "./presentation/reports.controller";
export * from "./core/dtos";
