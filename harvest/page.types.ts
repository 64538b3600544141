export const PAGE_TYPES = [
  "standard",
  "simple",
  "parent_overview",
  "multi_specialty",
  "structured",
  "service_complex",
] as const;

export type PageType = typeof PAGE_TYPES[number];

export type SubheadingTag = "h2" | "h3" | "h4" | "h5" | "h6";

export type BodyContent = {
  readonly mainParagraphs: string;          // paragraphs joined by a blank line
  readonly wordCount: number;
  readonly hasSubheadings: boolean;
  readonly subheadingTags: readonly SubheadingTag[];
  readonly hasBulletLists: boolean;
  readonly hasCollapsibleSections: boolean;
};

export type Link = {
  readonly text: string;
  readonly url: string;
};

export type LinkGroup = {
  readonly present: boolean;
  readonly count: number;
  readonly links: readonly Link[];
};

export type FacultyLink = Link & {
  readonly specialty: string;               // "" when nothing could be inferred
};

export type FacultyPattern = "single" | "multiple" | "none";

export type FacultyLinkGroup = {
  readonly count: number;
  readonly pattern: FacultyPattern;
  readonly links: readonly FacultyLink[];
};

export type ClickHereLink = {
  readonly present: boolean;
  readonly text: string;
  readonly url: string;
};

export type FamilyHifazat = {
  readonly mainLinkPresent: boolean;
  readonly googlePlayButton: boolean;
  readonly appStoreButton: boolean;
};

export type AppointmentComponents = {
  readonly heading?: string;
  readonly clickHereLink: ClickHereLink;
  readonly phoneNumber?: string;
  readonly familyHifazat: FamilyHifazat;
};

export type AppointmentSection =
  | { readonly present: false }
  | { readonly present: true; readonly components: AppointmentComponents };

export type LinkType = "external" | "internal" | "document";

export type ExternalLink = Link & {
  readonly type: LinkType;
};

export type PageRecord = {
  readonly url: string;
  readonly pageTitle: string;
  readonly breadcrumb?: string;
  readonly hasH1Title: boolean;
  readonly bodyContent: BodyContent;
  readonly subsectionLinks: LinkGroup;
  readonly facultyLinks: FacultyLinkGroup;
  readonly appointmentSection: AppointmentSection;
  readonly externalLinks: readonly ExternalLink[];
  readonly pageTypeClassification: PageType;
};

export type RunSummary = {
  totalPages: number;
  pagesScraped: number;
  pagesFailed: number;
  failedUrls: string[];
};
