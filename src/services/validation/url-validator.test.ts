import test from "node:test";
import assert from "node:assert/strict";
import { ScrapeError } from "../scraper/errors.js";
import {
  getDomainFromUrl,
  isValidUrl,
  normalizeUrl,
  validateUrlBatch,
  validateUrlStrict,
} from "./url-validator.js";

const validationError = (message: string) => (error: unknown) => {
  assert.ok(error instanceof ScrapeError);
  assert.equal(error.kind, "ValidationError");
  assert.equal(error.message, message);
  return true;
};

test("isValidUrl accepts public http and https pages", () => {
  assert.equal(isValidUrl("https://example.com/article"), true);
  assert.equal(isValidUrl("http://news.example.org/2024/05/story?id=7"), true);
  assert.equal(isValidUrl("http://172.15.0.1/"), true);
});

test("isValidUrl flags suspicious paths without rejecting them", () => {
  assert.equal(isValidUrl("https://example.com/admin"), true);
});

test("isValidUrl rejects bad schemes, local targets and downloads", () => {
  assert.equal(isValidUrl("ftp://example.com/file"), false);
  assert.equal(isValidUrl("example.com"), false);
  assert.equal(isValidUrl("http://localhost:3000"), false);
  assert.equal(isValidUrl("http://127.0.0.1/"), false);
  assert.equal(isValidUrl("http://10.0.0.1/"), false);
  assert.equal(isValidUrl("http://172.20.1.1/"), false);
  assert.equal(isValidUrl("http://192.168.1.10/page"), false);
  assert.equal(isValidUrl("http://169.254.169.254/latest"), false);
  assert.equal(isValidUrl("https://example.com/report.PDF"), false);
  assert.equal(isValidUrl("https://example.com/setup.exe"), false);
  assert.equal(isValidUrl(42), false);
});

test("validateUrlStrict reports why a URL is rejected", () => {
  assert.throws(() => validateUrlStrict(7), validationError("URL must be a string"));
  assert.throws(() => validateUrlStrict("   "), validationError("URL cannot be empty"));
  assert.throws(
    () => validateUrlStrict(`https://example.com/${"a".repeat(2048)}`),
    validationError("URL too long (max 2048 characters)"),
  );
  assert.throws(() => validateUrlStrict("not a url"), validationError("Invalid URL format: not a url"));
  assert.throws(
    () => validateUrlStrict("http://127.0.0.1/"),
    validationError("URL not allowed for scraping: http://127.0.0.1/"),
  );
});

test("validateUrlStrict records the field and value", () => {
  try {
    validateUrlStrict("http://localhost/");
    assert.fail("expected a validation error");
  } catch (error) {
    assert.ok(error instanceof ScrapeError);
    assert.deepEqual(error.details, { field: "url", value: "http://localhost/" });
  }
});

test("validateUrlBatch keeps valid URLs in input order", () => {
  const urls = ["https://example.com/a", "http://localhost/", "https://example.org/b"];
  assert.deepEqual(validateUrlBatch(urls), ["https://example.com/a", "https://example.org/b"]);
});

test("validateUrlBatch rejects empty and oversized lists", () => {
  assert.throws(() => validateUrlBatch([]), validationError("URL list cannot be empty"));
  const tooMany = Array.from({ length: 101 }, (_, i) => `https://example.com/${i}`);
  assert.throws(() => validateUrlBatch(tooMany), validationError("Too many URLs in batch (max 100)"));
});

test("validateUrlBatch fails with examples when nothing is valid", () => {
  try {
    validateUrlBatch(["bad", "http://10.0.0.1/", "ftp://example.com", "also bad"]);
    assert.fail("expected a validation error");
  } catch (error) {
    assert.ok(error instanceof ScrapeError);
    assert.equal(error.message, "No valid URLs found in batch");
    assert.equal(error.details.field, "urls");
    assert.equal(error.details.invalid_count, 4);
    assert.deepEqual(error.details.examples, [
      { url: "bad", error: "Invalid URL format: bad" },
      { url: "http://10.0.0.1/", error: "URL not allowed for scraping: http://10.0.0.1/" },
      { url: "ftp://example.com", error: "Invalid URL format: ftp://example.com" },
    ]);
  }
});

test("normalizeUrl lower-cases the host and drops the fragment", () => {
  assert.equal(normalizeUrl("  https://Example.COM/Path?q=1#section "), "https://example.com/Path?q=1");
  assert.equal(normalizeUrl("not a url"), "not a url");
});

test("getDomainFromUrl returns host and port", () => {
  assert.equal(getDomainFromUrl("https://Example.com:8080/x"), "example.com:8080");
  assert.equal(getDomainFromUrl("nope"), null);
});
