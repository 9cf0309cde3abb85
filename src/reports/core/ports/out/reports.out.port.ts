import { Report, ReportStatus } from "../../dtos";

export abstract class ReportsOutPort {
  abstract findAll(status?: ReportStatus): Promise<Report[]>;
  abstract findById(id: string): Promise<Report | undefined>;
}
