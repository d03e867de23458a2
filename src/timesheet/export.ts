/**
 * Timesheet export
 *
 * Writes assembled rows as CSV or XLSX with the employee's static columns
 * filled in from the profile. Both formats share one column order.
 */

import ExcelJS from 'exceljs';
import type { EmployeeConfig } from '../config/types.js';
import type { CalendarDate, TimesheetRow } from '../types/timesheet.js';

export interface ExportRow {
  employeeId: string;
  employeeName: string;
  date: CalendarDate;
  project: string;
  task: string;
  taskDescription: string;
  authorizedHours: string;
  billable: string;
  role: string;
  site: string;
  status: string;
  remark: string;
}

export const TIMESHEET_COLUMNS: ReadonlyArray<{ header: string; key: keyof ExportRow; width: number }> = [
  { header: 'Employee Id', key: 'employeeId', width: 14 },
  { header: 'Employee Name', key: 'employeeName', width: 22 },
  { header: 'Date', key: 'date', width: 12 },
  { header: 'Project', key: 'project', width: 20 },
  { header: 'Task', key: 'task', width: 36 },
  { header: 'Task Description', key: 'taskDescription', width: 48 },
  { header: 'Authorized Hours', key: 'authorizedHours', width: 16 },
  { header: 'Billable', key: 'billable', width: 10 },
  { header: 'Role', key: 'role', width: 16 },
  { header: 'Site', key: 'site', width: 10 },
  { header: 'Status', key: 'status', width: 14 },
  { header: 'Remark', key: 'remark', width: 60 },
];

export type ExportFormat = 'csv' | 'xlsx';

export function toExportRows(rows: readonly TimesheetRow[], employee: EmployeeConfig): ExportRow[] {
  return rows.map((row) => ({
    employeeId: employee.id,
    employeeName: employee.name,
    date: row.date,
    project: row.project,
    task: row.task,
    taskDescription: row.taskDescription,
    authorizedHours: employee.authorizedHours,
    billable: employee.billable,
    role: employee.role,
    site: employee.site,
    status: row.status,
    remark: row.remark,
  }));
}

export function buildTimesheetWorkbook(
  rows: readonly TimesheetRow[],
  employee: EmployeeConfig
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Timesheet');

  sheet.columns = TIMESHEET_COLUMNS.map((column) => ({ ...column }));
  sheet.getRow(1).font = { bold: true };

  for (const row of toExportRows(rows, employee)) {
    sheet.addRow(row);
  }

  return workbook;
}

/** `timesheet_20260207.csv` for a run on 2026-02-07. */
export function defaultExportName(today: CalendarDate, format: ExportFormat): string {
  return `timesheet_${today.replace(/-/g, '')}.${format}`;
}

export async function timesheetCsv(
  rows: readonly TimesheetRow[],
  employee: EmployeeConfig
): Promise<string> {
  const buffer = await buildTimesheetWorkbook(rows, employee).csv.writeBuffer();
  return Buffer.from(buffer).toString('utf8');
}

export async function writeTimesheet(
  rows: readonly TimesheetRow[],
  employee: EmployeeConfig,
  format: ExportFormat,
  filePath: string
): Promise<void> {
  const workbook = buildTimesheetWorkbook(rows, employee);
  if (format === 'csv') {
    await workbook.csv.writeFile(filePath);
  } else {
    await workbook.xlsx.writeFile(filePath);
  }
}
