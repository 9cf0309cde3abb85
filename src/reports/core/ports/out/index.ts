export { ReportsOutPort } from "./reports.out.port";
