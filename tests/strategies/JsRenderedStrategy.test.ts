/**
 * JsRenderedStrategy Test
 * Runs against the in-process FakeBrowserLauncher
 */

import { describe, it, expect } from "@jest/globals";
import {
  JsRenderedStrategy,
  parseInterceptedPayload,
} from "@/strategies/JsRenderedStrategy";
import {
  InterceptConfigSchema,
  JsSourceSchema,
} from "@/core/domain/SourceConfig";
import type {
  IBrowserLauncher,
  IBrowserSession,
  IElementHandle,
} from "@/core/interfaces/IBrowserSession";
import {
  FakeBrowserLauncher,
  FakeElement,
  FakePage,
} from "../helpers/FakeBrowser";

const PAGE_URL = "https://shop.example.com/collections/resin";

const interceptConfig = InterceptConfigSchema.parse({
  urlPattern: "api/product",
  productUrlTemplate: "https://shop.example.com/products/{slug}",
});

const domSource = JsSourceSchema.parse({
  brand: "TestBrand",
  strategy: "js",
  url: PAGE_URL,
  cardSelector: ".tile",
});

class ThrowingPage extends FakePage {
  async querySelectorAll(): Promise<IElementHandle[]> {
    throw new Error("Target page has been closed");
  }
}

describe("parseInterceptedPayload", () => {
  it("unwraps paginated rows and fills the product URL template", () => {
    const body = {
      data: {
        rows: [
          { name: "Hyper PLA", slug: "hyper-pla", image: "https://cdn.example.com/h.png" },
          { slug: "no-name" },
          "junk",
        ],
      },
    };

    expect(parseInterceptedPayload(body, interceptConfig, "TestBrand")).toEqual([
      {
        brand: "TestBrand",
        name: "Hyper PLA",
        imageUrl: "https://cdn.example.com/h.png",
        productUrl: "https://shop.example.com/products/hyper-pla",
        tags: [],
        provenance: "playwright_intercept",
      },
    ]);
  });

  it("accepts a plain list and the img alias", () => {
    const body = { data: [{ name: "CR-PETG", img: "https://cdn.example.com/p.png" }] };

    const [product] = parseInterceptedPayload(body, interceptConfig, "TestBrand");

    expect(product.imageUrl).toBe("https://cdn.example.com/p.png");
    expect(product.productUrl).toBe("https://shop.example.com/products/");
  });

  it("returns nothing when the path does not lead to a list", () => {
    expect(parseInterceptedPayload({ data: { total: 3 } }, interceptConfig, "TestBrand")).toEqual([]);
    expect(parseInterceptedPayload("oops", interceptConfig, "TestBrand")).toEqual([]);
  });
});

describe("JsRenderedStrategy", () => {
  it("prefers intercepted listing responses over the DOM", async () => {
    const page = new FakePage({
      responses: [
        {
          url: "https://shop.example.com/api/product/list",
          body: { data: { rows: [{ name: "Hyper PLA", slug: "hyper-pla" }] } },
        },
        {
          url: "https://shop.example.com/api/cart",
          body: { data: { rows: [{ name: "Cart Item" }] } },
        },
        {
          url: "https://shop.example.com/api/product/other",
          status: 500,
          body: { data: [{ name: "Server Failure" }] },
        },
      ],
      cards: { ".tile": [new FakeElement({ text: "DOM Card" })] },
    });
    const launcher = new FakeBrowserLauncher([page]);
    const source = JsSourceSchema.parse({
      brand: "TestBrand",
      strategy: "js",
      url: PAGE_URL,
      cardSelector: ".tile",
      intercept: {
        urlPattern: "api/product",
        productUrlTemplate: "https://shop.example.com/products/{slug}",
      },
    });

    const products = await new JsRenderedStrategy(launcher).extract(source);

    expect(products.map((product) => product.name)).toEqual(["Hyper PLA"]);
    expect(products[0].productUrl).toBe("https://shop.example.com/products/hyper-pla");
    expect(page.queriedSelectors).toEqual([]);
    expect(launcher.closes).toBe(1);
  });

  it("scrapes product cards when nothing was intercepted", async () => {
    const page = new FakePage({
      cards: {
        "div.product-item": [
          new FakeElement({
            text: "Tough Resin\n$20",
            children: {
              h3: new FakeElement({ text: " Tough Resin " }),
              img: new FakeElement({ attributes: { "data-src": "https://cdn.example.com/t.jpg" } }),
              a: new FakeElement({ attributes: { href: "/products/tough" } }),
            },
          }),
          new FakeElement({ broken: true }),
          new FakeElement({ text: "Ok" }),
          new FakeElement({ text: "Flexible Resin 500g\nIn stock" }),
        ],
      },
    });
    const launcher = new FakeBrowserLauncher([page]);

    const products = await new JsRenderedStrategy(launcher).extract(domSource);

    expect(page.queriedSelectors).toEqual([".tile", "div.product-item"]);
    expect(products).toEqual([
      {
        brand: "TestBrand",
        name: "Tough Resin",
        imageUrl: "https://cdn.example.com/t.jpg",
        productUrl: "https://shop.example.com/products/tough",
        tags: [],
        provenance: "playwright_js",
      },
      {
        brand: "TestBrand",
        name: "Flexible Resin 500g",
        imageUrl: undefined,
        productUrl: undefined,
        tags: [],
        provenance: "playwright_js",
      },
    ]);
    expect(launcher.closes).toBe(1);
  });

  it("scrolls the listing before reading it", async () => {
    const page = new FakePage();

    await new JsRenderedStrategy(new FakeBrowserLauncher([page])).extract(domSource);

    expect(page.visited).toEqual([PAGE_URL]);
    expect(page.scrolls).toEqual([500, 3000, 3000, 3000, 3000, 3000]);
  });

  it("truncates long card names", async () => {
    const page = new FakePage({ cards: { ".tile": [new FakeElement({ text: "A".repeat(150) })] } });

    const [product] = await new JsRenderedStrategy(new FakeBrowserLauncher([page])).extract(domSource);

    expect(product.name).toBe("A".repeat(100));
  });

  it("still scrapes after a navigation timeout", async () => {
    const page = new FakePage({
      gotoError: new Error("Timeout 60000ms exceeded"),
      cards: { ".tile": [new FakeElement({ text: "Water Washable Resin" })] },
    });

    const products = await new JsRenderedStrategy(new FakeBrowserLauncher([page])).extract(domSource);

    expect(products.map((product) => product.name)).toEqual(["Water Washable Resin"]);
  });

  it("returns an empty list when the browser cannot start", async () => {
    const launcher: IBrowserLauncher = {
      launch: async (): Promise<IBrowserSession> => {
        throw new Error("Executable doesn't exist");
      },
    };

    await expect(new JsRenderedStrategy(launcher).extract(domSource)).resolves.toEqual([]);
  });

  it("closes the session when reading the page fails", async () => {
    const launcher = new FakeBrowserLauncher([new ThrowingPage()]);

    const products = await new JsRenderedStrategy(launcher).extract(domSource);

    expect(products).toEqual([]);
    expect(launcher.closes).toBe(1);
  });

  it("uses a fresh session per URL", async () => {
    const launcher = new FakeBrowserLauncher([new FakePage(), new FakePage()]);
    const source = JsSourceSchema.parse({
      brand: "TestBrand",
      strategy: "js",
      url: [PAGE_URL, "https://shop.example.com/collections/filament"],
    });

    await new JsRenderedStrategy(launcher).extract(source);

    expect(launcher.launches).toBe(2);
    expect(launcher.closes).toBe(2);
  });
});
