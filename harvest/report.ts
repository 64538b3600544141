import type { PageRecord, PageType } from "./page.types.js";

export type OutputReport = {
  recordCount: number;
  invalidFiles: number;
  pageTypes: Record<PageType, number>;
  pctWithAppointment: number;
  pctWithH1: number;
  avgWordCount: number;
};

const pct = (n: number, d: number) => (d ? Number(((n / d) * 100).toFixed(1)) : 0);

export function buildReport(records: readonly PageRecord[], invalidFiles = 0): OutputReport {
  const pageTypes: Record<PageType, number> = {
    standard: 0, simple: 0, parent_overview: 0, multi_specialty: 0, structured: 0, service_complex: 0,
  };
  for (const r of records) pageTypes[r.pageTypeClassification]++;
  const words = records.reduce((sum, r) => sum + r.bodyContent.wordCount, 0);

  return {
    recordCount: records.length,
    invalidFiles,
    pageTypes,
    pctWithAppointment: pct(records.filter(r => r.appointmentSection.present).length, records.length),
    pctWithH1: pct(records.filter(r => r.hasH1Title).length, records.length),
    avgWordCount: records.length ? Math.round(words / records.length) : 0,
  };
}
