#!/usr/bin/env node
import "dotenv/config";
import { existsSync } from "fs";
import { loadConfig, requireCmsCredentials, type HarvestConfig } from "./config.js";
import { ingestDepartments } from "./adapters/departments.ingest.js";
import { uploadRecords } from "./adapters/cms.upload.js";
import { StoryblokClient } from "./adapters/storyblok.client.js";
import { readRunOutput, writeRunOutput } from "./utils/emitter.js";
import { createHtmlFetcher, readLinksFile } from "./utils/httpHtml.js";

const USAGE = "Usage: harvest <scrape [linksFile] | upload <folder> | all [linksFile]> [--publish]";

async function scrape(cfg: HarvestConfig, linksFile: string): Promise<string> {
  if (!existsSync(linksFile)) throw new Error(`Links file not found: ${linksFile}`);
  const urls = readLinksFile(linksFile);
  console.log(`Found ${urls.length} URLs to scrape`);

  const result = await ingestDepartments(urls, {
    fetchPage: createHtmlFetcher(cfg.fetch),
    extraction: { siteDomain: cfg.siteDomain },
  });
  const outdir = writeRunOutput(cfg.outputRoot, result);

  const { summary } = result;
  console.log(`Scraping complete: ${summary.pagesScraped}/${summary.totalPages} scraped, ${summary.pagesFailed} failed`);
  for (const url of summary.failedUrls) console.log(`  failed: ${url}`);
  if (result.reviewUrls.length) console.log(`  flagged for review: ${result.reviewUrls.length}`);
  console.log(`Output folder: ${outdir}`);
  return outdir;
}

async function upload(cfg: HarvestConfig, folder: string, publish: boolean) {
  if (!existsSync(folder)) throw new Error(`Folder not found: ${folder}`);
  const creds = requireCmsCredentials(cfg);
  const { records, failures } = readRunOutput(folder);
  for (const f of failures) console.warn(`WARN skip ${f.file}: ${f.reason}`);
  if (!records.length) throw new Error(`No page records to upload in ${folder}`);
  console.log(`Found ${records.length} records to upload`);

  await uploadRecords(records, new StoryblokClient(creds), {
    contentType: cfg.cms.contentType,
    folderPath: cfg.cms.folderPath,
    publish,
  });
}

const modes: Record<string, (cfg: HarvestConfig, arg: string | undefined, publish: boolean) => Promise<void>> = {
  scrape: async (cfg, arg) => { await scrape(cfg, arg ?? cfg.linksFile); },
  upload: async (cfg, arg, publish) => {
    if (!arg) throw new Error(USAGE);
    await upload(cfg, arg, publish);
  },
  all: async (cfg, arg, publish) => {
    const outdir = await scrape(cfg, arg ?? cfg.linksFile);
    await upload(cfg, outdir, publish);
  },
};

const args = process.argv.slice(2);
const publishFlag = args.includes("--publish");
const [target, arg] = args.filter(a => a !== "--publish");
const mode = target ? modes[target] : undefined;
if (!target || !mode) {
  console.error(USAGE);
  process.exit(1);
}

Promise.resolve().then(() => {
  const config = loadConfig();
  return mode(config, arg, publishFlag || config.cms.publish);
}).then(() => {
  console.log(`${target} done`);
}).catch(err => {
  console.error(err);
  process.exit(1);
});
