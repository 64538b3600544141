import type { PageType } from "../page.types.js";

export type PageSignals = {
  hasH1Title: boolean;
  bodyNonEmpty: boolean;
  facultyCount: number;
  subsectionCount: number;
  appointmentPresent: boolean;
  hasSubheadings: boolean;
  hasCollapsibleSections: boolean;
};

export type Classification = {
  pageType: PageType;
  /** Set when no rule matched and the page fell back to `standard`. */
  needsReview: boolean;
};

type Rule = { type: PageType; when: (s: PageSignals) => boolean };

// Order matters: real pages satisfy several of these at once and the first match wins.
const RULES: readonly Rule[] = [
  { type: "service_complex", when: s => !s.hasH1Title && !s.hasCollapsibleSections && s.facultyCount >= 2 },
  { type: "parent_overview", when: s => s.hasH1Title && s.subsectionCount > 0 },
  { type: "multi_specialty", when: s => s.hasH1Title && s.facultyCount >= 3 },
  { type: "structured", when: s => s.hasH1Title && s.hasSubheadings && s.facultyCount === 0 },
  { type: "standard", when: s => s.hasH1Title && s.bodyNonEmpty && s.facultyCount === 1 && s.appointmentPresent },
  { type: "simple", when: s => s.hasH1Title && s.bodyNonEmpty && s.facultyCount >= 1 && !s.appointmentPresent },
];

export function classifyPage(signals: PageSignals): Classification {
  const rule = RULES.find(r => r.when(signals));
  return rule
    ? { pageType: rule.type, needsReview: false }
    : { pageType: "standard", needsReview: true };
}
