import { z } from "zod";
import { PAGE_TYPES } from "./page.types.js";

const LinkSchema = z.object({ text: z.string(), url: z.string() });

export const PageRecordSchema = z.object({
  url: z.string().min(1),
  pageTitle: z.string(),
  breadcrumb: z.string().optional(),
  hasH1Title: z.boolean(),
  bodyContent: z.object({
    mainParagraphs: z.string(),
    wordCount: z.number().int().nonnegative(),
    hasSubheadings: z.boolean(),
    subheadingTags: z.array(z.enum(["h2", "h3", "h4", "h5", "h6"])),
    hasBulletLists: z.boolean(),
    hasCollapsibleSections: z.boolean(),
  }),
  subsectionLinks: z.object({
    present: z.boolean(),
    count: z.number().int().nonnegative(),
    links: z.array(LinkSchema),
  }),
  facultyLinks: z.object({
    count: z.number().int().nonnegative(),
    pattern: z.enum(["single", "multiple", "none"]),
    links: z.array(LinkSchema.extend({ specialty: z.string() })),
  }),
  appointmentSection: z.discriminatedUnion("present", [
    z.object({ present: z.literal(false) }),
    z.object({
      present: z.literal(true),
      components: z.object({
        heading: z.string().optional(),
        clickHereLink: z.object({ present: z.boolean(), text: z.string(), url: z.string() }),
        phoneNumber: z.string().optional(),
        familyHifazat: z.object({
          mainLinkPresent: z.boolean(),
          googlePlayButton: z.boolean(),
          appStoreButton: z.boolean(),
        }),
      }),
    }),
  ]),
  externalLinks: z.array(LinkSchema.extend({ type: z.enum(["external", "internal", "document"]) })),
  pageTypeClassification: z.enum(PAGE_TYPES),
});
