import { Transform } from "class-transformer";
import { IsIn, IsInt, IsOptional, Max, Min } from "class-validator";

export type ReportStatus = "draft" | "published" | "archived";

export const REPORT_STATUSES: readonly ReportStatus[] = [
  "draft",
  "published",
  "archived",
];

export interface Report {
  id: string;
  title: string;
  status: ReportStatus;
  rows: number;
}

export interface ReportSummary {
  total: number;
  rows: number;
  byStatus: Record<ReportStatus, number>;
}

export class ReportQuery {
  @IsOptional()
  @IsIn(REPORT_STATUSES)
  status?: ReportStatus;

  @IsOptional()
  @Transform(({ value }) => (typeof value === "string" ? Number(value) : value))
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;
}
