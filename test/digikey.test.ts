import test from "node:test";
import assert from "node:assert/strict";
import { DigiKeySupplier, parseDigiKeyProduct } from "../src/suppliers/digikey.js";
import { ImportError } from "../src/utils/errors.js";

const API = "https://api.digikey.test";

function product(mpn: string, sku: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    DigiKeyPartNumber: sku,
    ManufacturerPartNumber: mpn,
    ProductDescription: `IC MCU ${mpn}`,
    PrimaryPhoto: "",
    PrimaryDatasheet: "https://docs.test/stm32f103.pdf",
    ProductUrl: `https://www.digikey.test/product-detail/${sku}`,
    Manufacturer: { Value: "STMicroelectronics" },
    QuantityAvailable: 100,
    ManufacturerPublicQuantity: 0,
    Packaging: { Value: "Tray" },
    Category: { Value: "Integrated Circuits (ICs)" },
    Family: { Value: "Embedded - Microcontrollers" },
    Parameters: [{ Parameter: "Core Processor", Value: "ARM Cortex-M3" }],
    StandardPricing: [{ BreakQuantity: 1, UnitPrice: 7.2 }],
    ...extra
  };
}

type Route = (method: string, path: string, body: string) => Response | null;

function digikey(route: Route, now?: () => number) {
  const calls: Array<{ method: string; path: string; headers: Headers; body: string }> = [];
  const fetchImpl = async (input: Parameters<typeof fetch>[0], init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url);
    const method = init?.method ?? "GET";
    const body = typeof init?.body === "string" ? init.body : "";
    calls.push({ method, path: url.pathname, headers: new Headers(init?.headers), body });
    if (url.pathname === "/v1/oauth2/token") {
      return Response.json({ access_token: "test-access-token", expires_in: 600 });
    }
    return route(method, url.pathname, body) ?? new Response("", { status: 404 });
  };
  const supplier = new DigiKeySupplier({
    clientId: "test-client",
    clientSecret: "test-secret",
    apiUrl: API,
    currency: "EUR",
    location: "DE",
    language: "en",
    fetchImpl,
    now
  });
  return { supplier, calls };
}

test("parseDigiKeyProduct maps a product record", () => {
  const fields = parseDigiKeyProduct(
    {
      DigiKeyPartNumber: "311-1088-1-ND",
      ManufacturerPartNumber: "CC0603KRX7R9BB104",
      ProductDescription: "CAP CER 0.1UF 50V X7R 0603",
      PrimaryPhoto: "//mm.digikey.test/photo.jpg",
      PrimaryDatasheet: "https://docs.test/cc0603.pdf",
      ProductUrl: "https://www.digikey.test/product-detail/311-1088-1-ND",
      Manufacturer: { Value: "YAGEO" },
      QuantityAvailable: 1000,
      ManufacturerPublicQuantity: 500,
      Packaging: { Value: "Cut Tape (CT)" },
      Category: { Value: "Capacitors" },
      Family: { Value: "Ceramic Capacitors" },
      Parameters: [
        { Parameter: "Capacitance", Value: "0.1 µF" },
        { Parameter: "Voltage - Rated", Value: "50V" },
        { Parameter: "Ratings", Value: "" }
      ],
      StandardPricing: [
        { BreakQuantity: 1, UnitPrice: 0.1 },
        { BreakQuantity: 10, UnitPrice: "0.05" }
      ],
      MediaLinks: [
        { MediaType: "Datasheets", Url: "https://docs.test/cc0603.pdf" },
        { MediaType: "Manufacturer Product Page", Url: "https://yageo.test/cc0603" }
      ]
    },
    "EUR"
  );

  assert.deepEqual(fields, {
    description: "CAP CER 0.1UF 50V X7R 0603",
    imageUrl: "https://mm.digikey.test/photo.jpg",
    datasheetUrl: "https://docs.test/cc0603.pdf",
    supplierLink: "https://www.digikey.test/product-detail/311-1088-1-ND",
    sku: "311-1088-1-ND",
    manufacturer: "YAGEO",
    manufacturerLink: "https://yageo.test/cc0603",
    mpn: "CC0603KRX7R9BB104",
    quantityAvailable: 1500,
    packaging: "Cut Tape (CT)",
    categoryPath: ["Capacitors", "Ceramic Capacitors"],
    parameters: new Map([["Capacitance", "0.1 µF"], ["Voltage - Rated", "50V"]]),
    priceBreaks: new Map([[1, 0.1], [10, 0.05]]),
    currency: "EUR"
  });
});

test("parseDigiKeyProduct needs both part numbers", () => {
  assert.equal(parseDigiKeyProduct({ ManufacturerPartNumber: "X" }, "EUR"), null);
  assert.equal(parseDigiKeyProduct("not a product", "EUR"), null);
});

test("an exact part number match skips the keyword search", async () => {
  const { supplier, calls } = digikey((method, path) =>
    method === "GET" && path === "/Search/v3/Products/497-6063-ND" ? Response.json(product("STM32F103C8T6", "497-6063-ND")) : null
  );

  const result = await supplier.search("497-6063-ND");

  assert.equal(result.total, 1);
  assert.equal(result.parts[0]?.mpn, "STM32F103C8T6");
  assert.deepEqual(result.parts[0]?.categoryPath, ["Integrated Circuits (ICs)", "Embedded", "Microcontrollers"]);
  assert.deepEqual(calls.map((call) => [call.method, call.path]), [
    ["POST", "/v1/oauth2/token"],
    ["GET", "/Search/v3/Products/497-6063-ND"]
  ]);
  assert.equal(calls[1]?.headers.get("Authorization"), "Bearer test-access-token");
  assert.equal(calls[1]?.headers.get("X-DIGIKEY-Client-Id"), "test-client");
  assert.equal(calls[1]?.headers.get("X-DIGIKEY-Locale-Currency"), "EUR");
  assert.equal(calls[1]?.headers.get("X-DIGIKEY-Locale-Site"), "DE");
  assert.deepEqual(Object.fromEntries(new URLSearchParams(calls[0]?.body)), {
    client_id: "test-client",
    client_secret: "test-secret",
    grant_type: "client_credentials"
  });
});

const keywordResults = {
  ProductsCount: 42,
  Products: [
    product("STM32F103C8T6", "497-6063-ND"),
    product("STM32F103C8T7", "497-6064-ND"),
    product("XSTM32F103", "999-0001-ND")
  ],
  ExactManufacturerProductsCount: 0,
  ExactManufacturerProducts: []
};

test("keyword results keep listings whose part number starts with the term", async () => {
  const { supplier, calls } = digikey((method, path) =>
    method === "POST" && path === "/Search/v3/Products/Keyword" ? Response.json(keywordResults) : null
  );

  const result = await supplier.search("stm32f103c8");

  assert.equal(result.total, 42);
  assert.deepEqual(result.parts.map((part) => part.sku), ["497-6063-ND", "497-6064-ND"]);
  assert.deepEqual(JSON.parse(calls[2]?.body ?? ""), { Keywords: "stm32f103c8", RecordCount: 10 });
});

test("a single exact part number wins", async () => {
  const { supplier } = digikey((method, path) =>
    method === "POST" && path === "/Search/v3/Products/Keyword" ? Response.json(keywordResults) : null
  );

  const result = await supplier.search("stm32f103c8t6");

  assert.equal(result.total, 1);
  assert.deepEqual(result.parts.map((part) => part.sku), ["497-6063-ND"]);
});

test("exact manufacturer products take precedence", async () => {
  const { supplier } = digikey((method, path) =>
    method === "POST" && path === "/Search/v3/Products/Keyword"
      ? Response.json({
          ...keywordResults,
          ExactManufacturerProductsCount: 3,
          ExactManufacturerProducts: [product("LM317T", "497-1575-5-ND"), product("LM317TG", "LM317TGOS-ND")]
        })
      : null
  );

  const result = await supplier.search("LM317");

  assert.equal(result.total, 3);
  assert.deepEqual(result.parts.map((part) => part.mpn), ["LM317T", "LM317TG"]);
});

test("keyword listings load their details on finalize", async () => {
  const { supplier } = digikey((method, path) => {
    if (method === "POST" && path === "/Search/v3/Products/Keyword") {
      return Response.json({ ...keywordResults, Products: [product("STM32F103C8T6", "497-6063-ND")] });
    }
    if (method === "GET" && path === "/Search/v3/Products/497-6063-ND") {
      return Response.json(product("STM32F103C8T6", "497-6063-ND", {
        MediaLinks: [{ MediaType: "Manufacturer Product Page", Url: "https://st.test/stm32f103c8" }]
      }));
    }
    return null;
  });

  const [part] = (await supplier.search("STM32F103C8")).parts;
  assert.ok(part);
  assert.equal(part.manufacturerLink, "");

  assert.equal(await part.finalize(), true);
  assert.equal(part.manufacturerLink, "https://st.test/stm32f103c8");
});

test("the access token is reused until it expires", async () => {
  let clock = 1_000_000;
  const { supplier, calls } = digikey(() => null, () => clock);
  const tokenRequests = () => calls.filter((call) => call.path === "/v1/oauth2/token").length;

  await supplier.productDetails("A");
  await supplier.productDetails("B");
  assert.equal(tokenRequests(), 1);

  clock += 541_000;
  await supplier.productDetails("C");
  assert.equal(tokenRequests(), 2);
});

test("a rejected server answer fails the search", async () => {
  const { supplier } = digikey((method) => (method === "GET" ? new Response("", { status: 500 }) : null));

  await assert.rejects(
    supplier.search("STM32"),
    (error: unknown) => error instanceof ImportError && error.code === "supplier_http"
  );
});
