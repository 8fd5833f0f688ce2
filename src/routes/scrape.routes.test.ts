import test from "node:test";
import assert from "node:assert/strict";
import request from "supertest";
import { buildServer } from "../server.js";
import { ContentProcessor } from "../services/content/content-processor.js";
import type { ContentProcessingConfig } from "../services/content/types.js";
import { ScraperService } from "../services/scraper/scraper.service.js";
import type { ScrapingConfig } from "../services/scraper/types.js";
import { FakeRenderer } from "../testing/fake-renderer.js";
import { resolveBatchStatus } from "./scrape.routes.js";

const scrapingConfig: ScrapingConfig = {
  defaultWaitTime: 5,
  maxWaitTime: 30,
  maxConcurrentRequests: 10,
  requestTimeout: 5,
  defaultRemoveElements: ["nav", "footer"],
};

const contentConfig: ContentProcessingConfig = {
  rules: {
    ignoreLinks: true,
    ignoreImages: true,
    bodyWidth: 0,
    unicodeSnob: true,
    ignoreEmphasis: false,
    skipInternalLinks: true,
  },
  maxContentLength: 10_000,
  minContentLength: 0,
};

const GOOD = "https://example.com/article";
const OTHER = "https://example.com/other";

const renderer = new FakeRenderer(
  new Map([
    [GOOD, { html: "<body><nav>Menu</nav><h1>Welcome</h1><p>Hello there world.</p></body>", title: "Example" }],
    [OTHER, { html: "<p>Second page</p>", title: "" }],
  ]),
);
const contentProcessor = new ContentProcessor(contentConfig);
const scraper = new ScraperService({ renderer, contentProcessor, config: scrapingConfig });
const app = buildServer({ scraper, contentProcessor, scrapingConfig, contentConfig });

test("GET / reports the service as running", async () => {
  const res = await request(app).get("/");
  assert.equal(res.status, 200);
  assert.equal(res.body.service, "content-extraction-service");
  assert.equal(res.body.status, "running");
});

test("POST /api/v1/scrape returns the scraped page", async () => {
  const res = await request(app).post("/api/v1/scrape").send({ url: GOOD });

  assert.equal(res.status, 200);
  assert.equal(res.body.success, true);
  assert.equal(res.body.url, GOOD);
  assert.equal(res.body.title, "Example");
  assert.equal(res.body.content, "# Example\n\n# Welcome\n\nHello there world.");
  assert.equal(res.body.word_count, 7);
  assert.equal(res.body.html, undefined);
});

test("POST /api/v1/scrape honours output_format and include_title", async () => {
  const res = await request(app)
    .post("/api/v1/scrape")
    .send({ url: OTHER, output_format: "both", include_title: false });

  assert.equal(res.status, 200);
  assert.equal(res.body.content, "Second page");
  assert.equal(res.body.html, "<html><head></head><body><p>Second page</p></body></html>");
  assert.equal(res.body.title, undefined);
});

test("POST /api/v1/scrape answers 422 with the failure when the scrape fails", async () => {
  const res = await request(app).post("/api/v1/scrape").send({ url: "https://unknown.example.com/" });

  assert.equal(res.status, 422);
  assert.equal(res.body.success, false);
  assert.equal(res.body.error_type, "NetworkError");
  assert.equal(res.body.error_code, "NETWORK_ERROR");
  assert.equal(res.body.error_details.url, "https://unknown.example.com/");
});

test("POST /api/v1/scrape answers 422 for URLs that may not be scraped", async () => {
  const res = await request(app).post("/api/v1/scrape").send({ url: "http://192.168.1.10/panel" });

  assert.equal(res.status, 422);
  assert.equal(res.body.error_type, "ValidationError");
  assert.equal(res.body.error, "Invalid or unsafe URL: http://192.168.1.10/panel");
});

test("POST /api/v1/scrape rejects malformed requests", async () => {
  const res = await request(app).post("/api/v1/scrape").send({ url: "not-a-url", wait_time: 99 });

  assert.equal(res.status, 400);
  assert.equal(res.body.error_code, "INVALID_REQUEST");
  const fields = res.body.details.validation_errors.map((issue: { field: string }) => issue.field).sort();
  assert.deepEqual(fields, ["url", "wait_time"]);
});

test("POST /api/v1/scrape rejects invalid JSON", async () => {
  const res = await request(app)
    .post("/api/v1/scrape")
    .set("Content-Type", "application/json")
    .set("X-Request-Id", "test-request-1")
    .send('{"url":');

  assert.equal(res.status, 400);
  assert.equal(res.body.error_code, "INVALID_JSON");
  assert.equal(res.body.request_id, "test-request-1");
  assert.equal(res.headers["x-request-id"], "test-request-1");
});

test("POST /api/v1/scrape/batch answers 200 when every URL succeeds", async () => {
  const res = await request(app)
    .post("/api/v1/scrape/batch")
    .send({ urls: [GOOD, OTHER], delay_between_requests: 0.1 });

  assert.equal(res.status, 200);
  assert.equal(res.body.success, true);
  assert.equal(res.body.total_urls, 2);
  assert.equal(res.body.successful_scrapes, 2);
  assert.equal(res.body.failed_scrapes, 0);
  assert.equal(res.body.results.length, 2);
});

test("POST /api/v1/scrape/batch answers 207 on partial failure", async () => {
  const res = await request(app)
    .post("/api/v1/scrape/batch")
    .send({ urls: [GOOD, "https://gone.example.com/"], delay_between_requests: 0.1 });

  assert.equal(res.status, 207);
  assert.equal(res.body.successful_scrapes, 1);
  assert.equal(res.body.failed_scrapes, 1);
});

test("POST /api/v1/scrape/batch answers 422 when every URL fails", async () => {
  const res = await request(app)
    .post("/api/v1/scrape/batch")
    .send({ urls: ["https://gone.example.com/", "https://missing.example.com/"], delay_between_requests: 0.1 });

  assert.equal(res.status, 422);
  assert.equal(res.body.successful_scrapes, 0);
  assert.equal(res.body.failed_scrapes, 2);
});

test("POST /api/v1/scrape/batch rejects duplicate URLs", async () => {
  const res = await request(app).post("/api/v1/scrape/batch").send({ urls: [GOOD, GOOD] });

  assert.equal(res.status, 400);
  assert.equal(res.body.error_code, "INVALID_REQUEST");
  assert.equal(res.body.details.validation_errors[0].message, "Duplicate URLs are not allowed");
});

test("POST /api/v1/scrape/batch rejects a batch with no scrapable URL", async () => {
  const res = await request(app)
    .post("/api/v1/scrape/batch")
    .send({ urls: ["http://localhost/a", "http://127.0.0.1/b"] });

  assert.equal(res.status, 400);
  assert.equal(res.body.error, "No valid URLs found in batch");
  assert.equal(res.body.error_code, "VALIDATION_ERROR");
  assert.equal(res.body.details.invalid_count, 2);
  assert.equal(res.body.details.examples.length, 2);
});

test("GET /api/v1/scrape/status lists capabilities and limits", async () => {
  const res = await request(app).get("/api/v1/scrape/status");

  assert.equal(res.status, 200);
  assert.equal(res.body.status, "operational");
  assert.equal(res.body.renderer, "fake");
  assert.deepEqual(res.body.capabilities.supported_formats, ["markdown", "html", "both"]);
  assert.equal(res.body.limits.max_batch_size, 50);
  assert.equal(res.body.limits.max_content_length, 10_000);
});

test("health endpoints report the service as up", async () => {
  const health = await request(app).get("/api/v1/health");
  assert.equal(health.status, 200);
  assert.equal(health.body.status, "healthy");
  assert.equal(health.body.checks.renderer, "fake");

  const liveness = await request(app).get("/api/v1/liveness");
  assert.equal(liveness.body.status, "alive");

  const readiness = await request(app).get("/api/v1/readiness");
  assert.equal(readiness.status, 200);
  assert.equal(readiness.body.checks.content_processor, "ready");
});

test("unknown routes answer 404", async () => {
  const res = await request(app).get("/api/v1/unknown");

  assert.equal(res.status, 404);
  assert.equal(res.body.error_code, "NOT_FOUND");
  assert.equal(res.body.error, "Route GET /api/v1/unknown not found");
  assert.equal(typeof res.headers["x-request-id"], "string");
});

test("resolveBatchStatus maps outcome counts to a status code", () => {
  assert.equal(resolveBatchStatus({ totalUrls: 3, successfulCount: 3 }), 200);
  assert.equal(resolveBatchStatus({ totalUrls: 3, successfulCount: 1 }), 207);
  assert.equal(resolveBatchStatus({ totalUrls: 3, successfulCount: 0 }), 422);
});
