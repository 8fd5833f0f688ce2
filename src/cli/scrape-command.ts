import { Command, InvalidArgumentError, Option } from "commander";
import { OUTPUT_FORMATS, type OutputFormat } from "../services/scraper/types.js";

export interface ScrapeCommandOptions {
  format: OutputFormat;
  concurrency: number;
  delay: number;
  metadata: boolean;
}

export type ScrapeCommandAction = (urls: string[], options: ScrapeCommandOptions) => Promise<void>;

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
};

export const createScrapeCommand = (action: ScrapeCommandAction): Command =>
  new Command()
    .name("scrape-urls")
    .description("Scrape URLs and print the batch result as JSON")
    .argument("<urls...>", "URLs to scrape")
    .addOption(new Option("-f, --format <format>", "output format").choices(OUTPUT_FORMATS).default("markdown"))
    .option("-c, --concurrency <n>", "pages rendered at once", parseNumber, 3)
    .option("-d, --delay <seconds>", "pause between scrapes of one slot", parseNumber, 1)
    .option("-m, --metadata", "extract page metadata", false)
    .action(async (urls: string[], options: ScrapeCommandOptions) => {
      await action(urls, options);
    });
