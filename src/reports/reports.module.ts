import { Module } from "@nestjs/common";
import { ReportsController } from "./presentation/reports.controller";
import { ReportsService } from "./service/reports.service";
import { ReportsOutAdapter } from "./infrastructure/reports.out.adapter";
import { ReportsOutPort } from "./core/ports/out";

@Module({
  controllers: [ReportsController],
  providers: [
    ReportsService,
    { provide: ReportsOutPort, useClass: ReportsOutAdapter },
  ],
})
export class ReportsModule {}
