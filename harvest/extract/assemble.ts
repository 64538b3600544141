import { EmptyContentError } from "../errors.js";
import type {
  AppointmentSection,
  BodyContent,
  ExternalLink,
  FacultyLinkGroup,
  LinkGroup,
  PageRecord,
} from "../page.types.js";
import type { Classification } from "./classify.js";
import type { TitleRegion } from "./locators.js";

export type LocatedHeader = {
  title: TitleRegion;
  breadcrumb?: string;
};

export type ExtractedFields = {
  bodyContent: BodyContent;
  subsectionLinks: LinkGroup;
  facultyLinks: FacultyLinkGroup;
  appointmentSection: AppointmentSection;
  externalLinks: ExternalLink[];
};

export type AssembleResult =
  | { ok: true; record: PageRecord }
  | { ok: false; error: EmptyContentError };

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

export function assemblePage(
  url: string,
  located: LocatedHeader,
  fields: ExtractedFields,
  classification: Classification,
): AssembleResult {
  const pageUrl = url.trim();
  if (!pageUrl) {
    return { ok: false, error: new EmptyContentError(url, "page url is empty") };
  }
  if (!located.title.title && !fields.bodyContent.mainParagraphs) {
    return { ok: false, error: new EmptyContentError(pageUrl) };
  }

  const record: PageRecord = {
    url: pageUrl,
    pageTitle: located.title.title,
    ...(located.breadcrumb ? { breadcrumb: located.breadcrumb } : {}),
    hasH1Title: located.title.hasH1,
    bodyContent: fields.bodyContent,
    subsectionLinks: fields.subsectionLinks,
    facultyLinks: fields.facultyLinks,
    appointmentSection: fields.appointmentSection,
    externalLinks: fields.externalLinks,
    pageTypeClassification: classification.pageType,
  };
  return { ok: true, record: deepFreeze(record) };
}
