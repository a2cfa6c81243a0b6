import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import type { Chooser } from "../src/import/chooser.js";
import { ImportResult } from "../src/import/importResult.js";
import { formatCandidateChoices, PartImporter, type PartImporterOptions } from "../src/import/partImporter.js";
import type { Supplier } from "../src/suppliers/types.js";
import { ImportError, RepositoryHttpError } from "../src/utils/errors.js";
import { FakeSupplier, makeApiPart, ScriptedChooser, testCatalog } from "./helpers/fakes.js";
import { MemoryRepository } from "./helpers/memoryRepository.js";

async function importerFor(suppliers: Supplier[], options: PartImporterOptions = {}, repository = new MemoryRepository()) {
  const catalog = await testCatalog(repository);
  return { repository, catalog, importer: new PartImporter(repository, suppliers, catalog, options) };
}

const secondListing = () => makeApiPart({
  sku: "595-C0603X7R104",
  supplierLink: "https://other.test/p/595-C0603X7R104",
  priceBreaks: new Map([[1, 0.12]])
});

/** Settles after a short timer and records when it did. */
function slowSupplier(events: string[]): FakeSupplier {
  return new FakeSupplier("later", "Later Supplier", async () => {
    await delay(20);
    events.push("search settled");
    return { parts: [secondListing()], total: 1 };
  });
}

test("formatCandidateChoices lines up the columns", () => {
  const choices = formatCandidateChoices([
    makeApiPart(),
    makeApiPart({ mpn: "C0603X7R104K", manufacturer: "Acme", sku: "CAP-2-ND", supplierLink: "https://supplier.test/p/CAP-2" })
  ]);

  assert.deepEqual(choices, [
    "C0603X7R104  | Acme Passives | CAP-1-ND (https://supplier.test/p/CAP-1)",
    "C0603X7R104K | Acme          | CAP-2-ND (https://supplier.test/p/CAP-2)"
  ]);
});

test("a single listing is imported end to end", async () => {
  const supplier = FakeSupplier.returning("test", "Test Supplier", [makeApiPart()]);
  const { repository, importer } = await importerFor([supplier]);

  const result = await importer.importPart("C0603X7R104");

  assert.equal(result, ImportResult.SUCCESS);
  assert.deepEqual(supplier.searches, ["C0603X7R104"]);
  assert.equal(repository.parts.length, 1);
  assert.equal(repository.manufacturerParts.length, 1);
  assert.equal(repository.supplierParts.length, 1);
  assert.deepEqual(repository.companies.map((company) => company.name), ["Test Supplier", "Acme Passives"]);
});

test("two suppliers of the same part share one manufacturer part", async () => {
  const { repository, importer } = await importerFor([
    FakeSupplier.returning("first", "First Supplier", [makeApiPart()]),
    FakeSupplier.returning("second", "Second Supplier", [secondListing()])
  ]);

  const result = await importer.importPart("C0603X7R104");

  assert.equal(result, ImportResult.SUCCESS);
  assert.equal(repository.parts.length, 1);
  assert.equal(repository.manufacturerParts.length, 1);
  assert.deepEqual(repository.supplierParts.map((part) => [part.SKU, part.manufacturer_part]), [
    ["CAP-1-ND", repository.manufacturerParts[0]?.pk],
    ["595-C0603X7R104", repository.manufacturerParts[0]?.pk]
  ]);
  assert.equal(repository.parameters.length, 2);
});

test("importing the same term twice changes nothing the second time", async () => {
  const suppliers = [FakeSupplier.returning("test", "Test Supplier", [makeApiPart()])];
  const { repository, catalog, importer } = await importerFor(suppliers);

  assert.equal(await importer.importPart("C0603X7R104"), ImportResult.SUCCESS);
  const writes = repository.writes.length;

  const again = new PartImporter(repository, [FakeSupplier.returning("test", "Test Supplier", [makeApiPart()])], catalog);
  assert.equal(await again.importPart("C0603X7R104"), ImportResult.SUCCESS);
  assert.equal(repository.writes.length, writes);
});

test("no results anywhere is a failure", async () => {
  const { importer } = await importerFor([FakeSupplier.returning("test", "Test Supplier", [])]);

  assert.equal(await importer.importPart("NOPE-123"), ImportResult.FAILURE);
});

test("an ambiguous search is skipped without a prompt", async () => {
  const { repository, importer } = await importerFor([
    FakeSupplier.returning("first", "First Supplier", [makeApiPart(), secondListing()], 37),
    FakeSupplier.returning("second", "Second Supplier", [secondListing()])
  ]);

  const result = await importer.importPart("C0603X7R104");

  assert.equal(result, ImportResult.INCOMPLETE);
  assert.deepEqual(repository.supplierParts.map((part) => part.SKU), ["595-C0603X7R104"]);
});

test("an interactive pick imports the chosen listing", async () => {
  const chooser = new ScriptedChooser([1]);
  const { repository, importer } = await importerFor(
    [FakeSupplier.returning("test", "Test Supplier", [makeApiPart(), secondListing()])],
    { chooser }
  );

  assert.equal(await importer.importPart("C0603X7R104"), ImportResult.SUCCESS);
  assert.deepEqual(repository.supplierParts.map((part) => part.SKU), ["595-C0603X7R104"]);
  assert.equal(chooser.prompts[0]?.prompt, "found multiple parts at Test Supplier, select which one to import");
  assert.equal(chooser.prompts[0]?.options.length, 3);
  assert.equal(chooser.prompts[0]?.options[2], "Skip ...");
});

test("skipping the pick leaves the term incomplete", async () => {
  const { repository, importer } = await importerFor(
    [FakeSupplier.returning("test", "Test Supplier", [makeApiPart(), secondListing()])],
    { chooser: new ScriptedChooser([2]) }
  );

  assert.equal(await importer.importPart("C0603X7R104"), ImportResult.FAILURE);
  assert.equal(repository.supplierParts.length, 0);
});

test("a failed search counts as incomplete", async () => {
  const { repository, importer } = await importerFor([
    FakeSupplier.failing("down", "Down Supplier", new Error("503")),
    FakeSupplier.returning("test", "Test Supplier", [makeApiPart()])
  ]);

  assert.equal(await importer.importPart("C0603X7R104"), ImportResult.INCOMPLETE);
  assert.equal(repository.supplierParts.length, 1);
});

test("a server error stops the term after the other searches settle", async () => {
  const events: string[] = [];
  const later = slowSupplier(events);
  const { repository, importer } = await importerFor([
    FakeSupplier.returning("test", "Test Supplier", [makeApiPart()]),
    later
  ]);
  repository.failNext("createSupplierPart", new RepositoryHttpError({
    status: 400,
    method: "POST",
    url: "http://inventree.test/api/company/part/",
    body: "{\"SKU\":[\"already exists\"]}"
  }));

  const result = await importer.importPart("C0603X7R104");
  events.push("import returned");

  assert.equal(result, ImportResult.ERROR);
  assert.deepEqual(events, ["search settled", "import returned"]);
  assert.equal(repository.supplierParts.length, 0);
});

test("a failing chooser waits for the other searches before rethrowing", async () => {
  const events: string[] = [];
  const closed: Chooser = {
    interactive: true,
    select: async () => {
      throw new Error("input closed");
    },
    input: async () => null
  };
  const { importer } = await importerFor([
    FakeSupplier.returning("test", "Test Supplier", [makeApiPart(), makeApiPart({ sku: "CAP-2-ND" })]),
    slowSupplier(events)
  ], { chooser: closed });

  await assert.rejects(importer.importPart("C0603X7R104"), { message: "input closed" });
  events.push("import returned");

  assert.deepEqual(events, ["search settled", "import returned"]);
});

test("a part keeps the image of the first supplier that had one", async () => {
  const { repository, importer } = await importerFor([
    FakeSupplier.returning("first", "First Supplier", [makeApiPart({ imageUrl: "https://img.test/a.jpg" })]),
    FakeSupplier.returning("second", "Second Supplier", [makeApiPart({
      sku: "595-C0603X7R104",
      supplierLink: "https://other.test/p/595-C0603X7R104",
      imageUrl: "https://img.test/b.jpg"
    })])
  ]);

  assert.equal(await importer.importPart("C0603X7R104"), ImportResult.SUCCESS);
  assert.equal(repository.count("uploadPartImage"), 1);
  assert.equal(repository.parts[0]?.image, "https://img.test/a.jpg");
});

test("an unexpected error propagates", async () => {
  const { repository, importer } = await importerFor([FakeSupplier.returning("test", "Test Supplier", [makeApiPart()])]);
  repository.failNext("createPart", new TypeError("bad payload"));

  await assert.rejects(importer.importPart("C0603X7R104"), TypeError);
});

test("supplier scope restricts and orders the searches", async () => {
  const first = FakeSupplier.returning("first", "First Supplier", []);
  const second = FakeSupplier.returning("second", "Second Supplier", [secondListing()]);
  const { repository, importer } = await importerFor([first, second]);

  assert.equal(await importer.importPart("C0603X7R104", { supplierId: "second", onlySupplier: true }), ImportResult.SUCCESS);
  assert.deepEqual(first.searches, []);
  assert.equal(repository.supplierParts.length, 1);

  await assert.rejects(importer.importPart("C0603X7R104", { supplierId: "missing" }), ImportError);
});
