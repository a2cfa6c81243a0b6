import test from "node:test";
import assert from "node:assert/strict";
import { describeHttpError, errorMessage, ImportError, isRepositoryHttpError, RepositoryHttpError } from "../src/utils/errors.js";

function httpError(body: string): RepositoryHttpError {
  return new RepositoryHttpError({ status: 400, method: "POST", url: "http://inventree.test/api/company/part/", body });
}

test("describeHttpError lists the fields of a JSON body", () => {
  const description = describeHttpError(httpError(JSON.stringify({ SKU: ["already exists", "too long"], part: 12 })));
  assert.equal(description, "\n    SKU: already exists, too long\n    part: 12");
});

test("describeHttpError falls back for bodies it cannot read", () => {
  assert.equal(describeHttpError(httpError("")), "'unknown HTTP error'");
  assert.equal(describeHttpError(httpError("<html>bad gateway</html>")), "'unknown HTTP error'");
  assert.equal(describeHttpError(httpError("[\"nope\"]")), "'unknown HTTP error'");
  assert.equal(describeHttpError(httpError("{}")), "'unknown HTTP error'");
});

test("RepositoryHttpError carries the request and a default message", () => {
  const error = httpError("{}");
  assert.equal(error.message, "POST http://inventree.test/api/company/part/ failed with status 400");
  assert.equal(error.status, 400);
  assert.equal(isRepositoryHttpError(error), true);
  assert.equal(isRepositoryHttpError(new ImportError("x", "y")), false);
});

test("errorMessage reads errors and strings", () => {
  assert.equal(errorMessage(new Error("broken")), "broken");
  assert.equal(errorMessage("plain"), "plain");
  assert.equal(errorMessage(42), "unknown_error");
});
