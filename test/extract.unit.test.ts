import { load } from "cheerio";
import { describe, expect, it } from "vitest";
import { EmptyContentError, ParseError } from "../harvest/errors.js";
import { classifyLink, dedupeLinks, findPhoneNumber } from "../harvest/extract/fields.js";
import { locateSections } from "../harvest/extract/locators.js";
import { extractPage } from "../harvest/extract/page.js";
import { fixture } from "./helpers.js";

const CARDIOLOGY = "https://hospitals.aku.edu/karachi/cardiology";

function extractOk(url: string, html: string) {
  const outcome = extractPage(url, html);
  if (!outcome.ok) throw outcome.error;
  return outcome;
}

describe("standard department page", () => {
  const { record, needsReview } = extractOk(CARDIOLOGY, fixture("standard.html"));

  it("reads title and breadcrumb", () => {
    expect(record.url).toBe(CARDIOLOGY);
    expect(record.pageTitle).toBe("Cardiology");
    expect(record.hasH1Title).toBe(true);
    expect(record.breadcrumb).toBe("Home > Health Services");
  });

  it("collects cleaned body paragraphs", () => {
    const paragraphs = record.bodyContent.mainParagraphs.split("\n\n");
    expect(paragraphs).toHaveLength(5);
    expect(paragraphs[0]).toBe("The Section of Cardiology provides comprehensive care for adults with heart disease.");
    expect(paragraphs[1]).toBe("Our team offers diagnostic testing, interventional procedures and rehabilitation.");
    expect(record.bodyContent.mainParagraphs).not.toContain("All rights reserved");
    expect(record.bodyContent.wordCount).toBe(59);
    expect(record.bodyContent.subheadingTags).toEqual(["h4"]);
    expect(record.bodyContent.hasSubheadings).toBe(true);
    expect(record.bodyContent.hasBulletLists).toBe(false);
    expect(record.bodyContent.hasCollapsibleSections).toBe(false);
  });

  it("finds the single faculty link with its specialty", () => {
    expect(record.facultyLinks).toEqual({
      count: 1,
      pattern: "single",
      links: [{
        text: "Meet our Cardiology faculty",
        url: "https://hospitals.aku.edu/hospital/karachi/findadoctor.aspx?Spec=Cardiology",
        specialty: "Cardiology",
      }],
    });
  });

  it("extracts the appointment components", () => {
    expect(record.appointmentSection).toEqual({
      present: true,
      components: {
        heading: "Request an Appointment",
        clickHereLink: { present: true, text: "Click here", url: "https://hospitals.aku.edu/karachi/appointment" },
        phoneNumber: "+92-21-1234567",
        familyHifazat: { mainLinkPresent: true, googlePlayButton: true, appStoreButton: true },
      },
    });
  });

  it("leaves only unclaimed links for the external list", () => {
    expect(record.externalLinks).toEqual([
      {
        text: "patient guide",
        url: "https://hospitals.aku.edu/hospital/karachi/Documents/cardiology-guide.pdf",
        type: "document",
      },
      { text: "American Heart Association", url: "https://www.heart.org/en/health-topics", type: "external" },
    ]);
    const facultyUrls = record.facultyLinks.links.map(l => l.url);
    expect(record.externalLinks.some(l => facultyUrls.includes(l.url))).toBe(false);
  });

  it("classifies as standard without review", () => {
    expect(record.pageTypeClassification).toBe("standard");
    expect(needsReview).toBe(false);
    expect(record.subsectionLinks).toEqual({ present: false, count: 0, links: [] });
  });

  it("returns a frozen record", () => {
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.facultyLinks.links)).toBe(true);
  });
});

describe("parent overview page", () => {
  const url = "https://hospitals.aku.edu/karachi/health-services";
  const { record } = extractOk(url, fixture("parent-overview.html"));

  it("collects deduplicated subsection links from content lists only", () => {
    expect(record.subsectionLinks).toEqual({
      present: true,
      count: 3,
      links: [
        { text: "Cardiology", url: "https://hospitals.aku.edu/karachi/health-services/cardiology" },
        { text: "Oncology", url: "https://hospitals.aku.edu/karachi/health-services/oncology/" },
        { text: "Neurology", url: "https://hospitals.aku.edu/karachi/health-services/neurology" },
      ],
    });
  });

  it("classifies as parent_overview", () => {
    expect(record.pageTypeClassification).toBe("parent_overview");
    expect(record.breadcrumb).toBeUndefined();
    expect("breadcrumb" in record).toBe(false);
    expect(record.bodyContent.hasBulletLists).toBe(true);
    expect(record.externalLinks).toEqual([]);
    expect(record.appointmentSection).toEqual({ present: false });
  });
});

describe("service complex page", () => {
  const url = "https://hospitals.aku.edu/karachi/kidney-transplant";
  const { record } = extractOk(url, fixture("service-complex.html"));

  it("falls back to the first h2 for the title", () => {
    expect(record.pageTitle).toBe("Kidney Transplant Programme");
    expect(record.hasH1Title).toBe(false);
  });

  it("does not count the title heading as a subheading", () => {
    expect(record.bodyContent.subheadingTags).toEqual(["h4"]);
  });

  it("classifies as service_complex", () => {
    expect(record.facultyLinks.pattern).toBe("multiple");
    expect(record.facultyLinks.links.map(l => l.specialty)).toEqual(["Nephrology", "Urology"]);
    expect(record.pageTypeClassification).toBe("service_complex");
  });
});

describe("faculty specialty inference", () => {
  const html = `<html><body><main>
    <h1>Digestive Health</h1>
    <p>Digestive health services for adults and children.</p>
    <h4>Gastroenterology <a href="/findadoctor.aspx?id=3">Find a Doctor</a></h4>
    <h3>Hepatology</h3>
    <p><a href="/doctor-profile/ali">Dr. Ali Khan</a></p>
    <p><a href="/find-a-doctor">Meet our Pulmonology specialists</a></p>
  </main></body></html>`;
  const { record } = extractOk("https://hospitals.aku.edu/karachi/digestive", html);

  it("uses heading text, the preceding heading, and the link wording", () => {
    expect(record.facultyLinks.links.map(l => l.specialty)).toEqual(["Gastroenterology", "Hepatology", "Pulmonology"]);
    expect(record.pageTypeClassification).toBe("multi_specialty");
  });
});

describe("appointment marker inside a container", () => {
  const html = `<html><body><main>
    <h1>Eye Clinic</h1>
    <p>Comprehensive eye care for all ages.</p>
    <div class="cta"><span>Request Appointment</span> <a href="tel:+922134930051">Call us</a></div>
  </main></body></html>`;
  const outcome = extractOk("https://hospitals.aku.edu/karachi/eye", html);

  it("takes the phone from a tel link and does not treat it as the booking link", () => {
    expect(outcome.record.appointmentSection).toEqual({
      present: true,
      components: {
        heading: undefined,
        clickHereLink: { present: false, text: "", url: "" },
        phoneNumber: "+922134930051",
        familyHifazat: { mainLinkPresent: false, googlePlayButton: false, appStoreButton: false },
      },
    });
    expect(outcome.record.externalLinks).toEqual([]);
  });

  it("flags pages no rule matches for review", () => {
    expect(outcome.record.pageTypeClassification).toBe("standard");
    expect(outcome.needsReview).toBe(true);
  });
});

describe("appointment marker directly inside the content container", () => {
  const html = `<html><body><div class="ContentMain">
    <h1>Cardiology</h1>
    <p>Learn more at the <a href="https://www.heart.org/">American Heart Association</a>.</p>
    <b>Request an Appointment</b> <a href="/appointment">Book online</a>
  </div></body></html>`;
  const { record } = extractOk(CARDIOLOGY, html);

  it("keeps the region to the marker and its following siblings", () => {
    expect(record.appointmentSection).toEqual({
      present: true,
      components: {
        heading: "Request an Appointment",
        clickHereLink: { present: true, text: "Book online", url: "https://hospitals.aku.edu/appointment" },
        phoneNumber: undefined,
        familyHifazat: { mainLinkPresent: false, googlePlayButton: false, appStoreButton: false },
      },
    });
  });

  it("leaves the other content links to the external list", () => {
    expect(record.externalLinks).toEqual([
      { text: "American Heart Association", url: "https://www.heart.org/", type: "external" },
    ]);
  });
});

describe("appointment marker outside the content container", () => {
  const html = `<html><body><div class="page">
    <div class="ContentMain">
      <h1>Eye Clinic</h1>
      <p>Read about <a href="https://www.aao.org/eye-health">eye health</a> before your visit.</p>
    </div>
    <span>Request Appointment</span>
  </div></body></html>`;
  const { record } = extractOk("https://hospitals.aku.edu/karachi/eye", html);

  it("never widens the region to a wrapper around the content", () => {
    expect(record.appointmentSection).toEqual({
      present: true,
      components: {
        heading: undefined,
        clickHereLink: { present: false, text: "", url: "" },
        phoneNumber: undefined,
        familyHifazat: { mainLinkPresent: false, googlePlayButton: false, appStoreButton: false },
      },
    });
    expect(record.externalLinks).toEqual([
      { text: "eye health", url: "https://www.aao.org/eye-health", type: "external" },
    ]);
  });
});

describe("page chrome", () => {
  it("keeps navigation lists inside the content area out of subsection links", () => {
    const $ = load(fixture("parent-overview.html"));
    const located = locateSections($);
    expect(located.subsectionAnchors.map(a => $(a).text())).toEqual([
      "Cardiology", "Oncology", "Neurology", "Cardiology Overview",
    ]);
  });

  it("marks collapsible sections by heading id", () => {
    const $ = load(`<main><h1>FAQ</h1><h4 id="collapseOne">Visiting hours</h4><p>Visiting hours are 5 to 8 pm.</p></main>`);
    expect(locateSections($).hasCollapsibleSections).toBe(true);
  });
});

describe("failures", () => {
  it("rejects empty markup as a parse error", () => {
    const outcome = extractPage(CARDIOLOGY, "   ");
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(ParseError);
    expect(outcome.error.message).toBe("empty markup");
    expect(outcome.stage).toBe("fetched");
  });

  it("rejects markup without elements", () => {
    const outcome = extractPage(CARDIOLOGY, "plain text only");
    if (outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(ParseError);
    expect(outcome.error.message).toBe("markup contains no elements");
  });

  it("fails with EmptyContentError when title and body are both empty", () => {
    const outcome = extractPage(CARDIOLOGY, `<html><body><div class="ContentMain"><p>   </p></div></body></html>`);
    if (outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(EmptyContentError);
    expect(outcome.error.url).toBe(CARDIOLOGY);
    expect(outcome.stage).toBe("classified");
  });
});

describe("findPhoneNumber", () => {
  it("accepts local and international formats", () => {
    expect(findPhoneNumber("call to book an appointment: +92-21-1234567 or")).toBe("+92-21-1234567");
    expect(findPhoneNumber("Call (021)111911911 today")).toBe("(021)111911911");
  });

  it("skips year ranges that come before the number", () => {
    expect(findPhoneNumber("Serving clinics 2023-2024: call 021-3486-1000")).toBe("021-3486-1000");
  });

  it("stops before an hours range", () => {
    expect(findPhoneNumber("Call 021 3486 1000 - 10 am to 5 pm")).toBe("021 3486 1000");
  });

  it("keeps an extension", () => {
    expect(findPhoneNumber("Reception (021) 3486 1000 ext. 4520")).toBe("(021) 3486 1000 ext. 4520");
  });

  it("ignores short digit runs", () => {
    expect(findPhoneNumber("Open 9 to 5, room 12")).toBeUndefined();
  });
});

describe("classifyLink", () => {
  const page = "https://hospitals.aku.edu/karachi/cardiology";

  it("checks document extensions first", () => {
    expect(classifyLink("https://www.who.int/report.pdf", page)).toBe("document");
  });

  it("treats the page host and the site domain as internal", () => {
    expect(classifyLink("https://hospitals.aku.edu/karachi/other", page)).toBe("internal");
    expect(classifyLink("https://www.aku.edu/about", page)).toBe("external");
    expect(classifyLink("https://www.aku.edu/about", page, "aku.edu")).toBe("internal");
  });
});

describe("dedupeLinks", () => {
  it("keeps the first of each normalized url and is idempotent", () => {
    const links = [
      { text: "Oncology", url: "https://hospitals.aku.edu/oncology/" },
      { text: "Oncology team", url: "https://hospitals.aku.edu/oncology#team" },
      { text: "Neurology", url: "https://hospitals.aku.edu/neurology" },
    ];
    const once = dedupeLinks(links);
    expect(once.map(l => l.text)).toEqual(["Oncology", "Neurology"]);
    expect(dedupeLinks(once)).toEqual(once);
  });
});
