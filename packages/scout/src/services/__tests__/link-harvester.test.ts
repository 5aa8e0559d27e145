/**
 * Page Link Harvester Tests
 */

import { describe, it, expect, vi } from "vitest";
import {
  collectAnchorHostnames,
  harvestDomains,
  hostnameFromHref,
} from "../link-harvester";
import { PageFetchError, UnsafeUrlError } from "../../core/errors";
import type { FetchLike } from "../../core/types";
import {
  createFetchStub,
  htmlResponse,
  publicResolver,
  redirectResponse,
  requestedUrls,
  tableResolver,
} from "../../test/mocks";

function streamOf(chunks: string[], failAfter?: number): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (failAfter !== undefined && index === failAfter) {
        controller.error(new Error("connection reset"));
        return;
      }
      const chunk = chunks[index++];
      if (chunk === undefined) {
        controller.close();
      } else {
        controller.enqueue(encoder.encode(chunk));
      }
    },
  });
}

describe("hostnameFromHref", () => {
  it("should return the hostname of an absolute URL", () => {
    expect(hostnameFromHref("https://Blog.Example.org/post/1")).toBe(
      "blog.example.org"
    );
  });

  it("should drop the port", () => {
    expect(hostnameFromHref("http://example.net:8080/x")).toBe("example.net");
  });

  it("should read protocol-relative links", () => {
    expect(hostnameFromHref("//cdn.example.com/app.js")).toBe("cdn.example.com");
  });

  it.each(["/about", "post.html", "#top", "?page=2", "", "   "])(
    "should ignore relative href %j",
    (href) => {
      expect(hostnameFromHref(href)).toBeNull();
    }
  );

  it("should ignore links without a host", () => {
    expect(hostnameFromHref("mailto:editor@example.com")).toBeNull();
    expect(hostnameFromHref("javascript:void(0)")).toBeNull();
  });

  it("should ignore hostnames longer than 253 characters", () => {
    const label = "a".repeat(63);
    const host = [label, label, label, label].join(".");
    expect(host.length).toBe(255);

    expect(hostnameFromHref(`https://${host}/`)).toBeNull();
    expect(hostnameFromHref(`https://${host.slice(2)}/`)).toBe(host.slice(2));
  });

  it("should ignore malformed URLs", () => {
    expect(hostnameFromHref("http://exa mple.com/")).toBeNull();
    expect(hostnameFromHref("https://")).toBeNull();
  });
});

describe("collectAnchorHostnames", () => {
  it("should collect unique anchor hostnames", async () => {
    const html = `<html><body>
      <a href="https://a.example.com/1">one</a>
      <a href="https://a.example.com/2">two</a>
      <A HREF="https://b.example.com/">three</A>
      <a href="/relative">four</a>
      <link rel="stylesheet" href="https://styles.example.com/site.css">
      <img src="https://images.example.com/logo.png">
    </body></html>`;

    const domains = await collectAnchorHostnames(streamOf([html]));

    expect([...domains].sort()).toEqual(["a.example.com", "b.example.com"]);
  });

  it("should handle tags split across chunks", async () => {
    const domains = await collectAnchorHostnames(
      streamOf(['<p><a hr', 'ef="https://split.exa', 'mple.com/x">x</a></p>'])
    );

    expect([...domains]).toEqual(["split.example.com"]);
  });

  it("should decode entities in href values", async () => {
    const domains = await collectAnchorHostnames(
      streamOf(['<a href="https://amp.example.com/?a=1&amp;b=2">x</a>'])
    );

    expect([...domains]).toEqual(["amp.example.com"]);
  });

  it("should skip malformed hrefs without aborting", async () => {
    const domains = await collectAnchorHostnames(
      streamOf([
        '<a href="http://exa mple.com">bad</a><a>no href</a><a href="https://good.example.com">ok</a>',
      ])
    );

    expect([...domains]).toEqual(["good.example.com"]);
  });

  it("should return what was collected when the stream errors", async () => {
    const onReadError = vi.fn();
    const domains = await collectAnchorHostnames(
      streamOf(['<a href="https://first.example.com">1</a>', "<a href="], 1),
      onReadError
    );

    expect([...domains]).toEqual(["first.example.com"]);
    expect(onReadError).toHaveBeenCalledTimes(1);
  });
});

describe("harvestDomains", () => {
  it("should fetch the page and return linked hostnames", async () => {
    const fetchStub = createFetchStub({
      "https://news.example.com": () =>
        htmlResponse(
          '<a href="https://techblog.example.org/post">t</a><a href="https://sports.example.net">s</a>'
        ),
    });

    const domains = await harvestDomains("https://news.example.com", {
      fetch: fetchStub,
      resolver: publicResolver,
    });

    expect([...domains].sort()).toEqual([
      "sports.example.net",
      "techblog.example.org",
    ]);
    expect(fetchStub).toHaveBeenCalledTimes(1);
  });

  it("should send a timeout signal and user agent", async () => {
    const fetchStub = createFetchStub({
      "https://news.example.com": () => htmlResponse("<p>empty</p>"),
    });

    await harvestDomains("https://news.example.com", {
      fetch: fetchStub,
      resolver: publicResolver,
    });

    expect(fetchStub).toHaveBeenCalledWith(
      "https://news.example.com",
      expect.objectContaining({
        headers: expect.objectContaining({ "User-Agent": "feedseeker/1.0" }),
        signal: expect.any(AbortSignal),
      })
    );
  });

  it("should fail fast on a private seed URL without fetching", async () => {
    const fetchStub = createFetchStub({});

    await expect(
      harvestDomains("https://router.example", {
        fetch: fetchStub,
        resolver: tableResolver({ "router.example": ["192.168.0.1"] }),
      })
    ).rejects.toMatchObject({ code: "PRIVATE_NETWORK" });
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it("should refuse a redirect into a private network", async () => {
    const fetchStub = createFetchStub({
      "https://news.example.com": () =>
        redirectResponse("http://localhost:8080/admin", 302),
      "http://localhost:8080/admin": () =>
        htmlResponse('<a href="https://internal.example.com">internal</a>'),
    });

    await expect(
      harvestDomains("https://news.example.com", {
        fetch: fetchStub,
        resolver: tableResolver({
          "news.example.com": ["93.184.216.34"],
          localhost: ["127.0.0.1"],
        }),
      })
    ).rejects.toMatchObject({
      name: "PageFetchError",
      code: "PAGE_FETCH_FAILED",
      message:
        "Failed to fetch page https://news.example.com: redirect blocked: Requests to private/internal IP addresses are not allowed: localhost resolves to 127.0.0.1",
    });
    expect(requestedUrls(fetchStub)).toEqual(["https://news.example.com"]);
  });

  it("should follow a redirect to a public page", async () => {
    const fetchStub = createFetchStub({
      "https://news.example.com": () =>
        redirectResponse("https://www.news.example.com/"),
      "https://www.news.example.com/": () =>
        htmlResponse('<a href="https://techblog.example.org/post">t</a>'),
    });

    const domains = await harvestDomains("https://news.example.com", {
      fetch: fetchStub,
      resolver: publicResolver,
    });

    expect([...domains]).toEqual(["techblog.example.org"]);
    expect(requestedUrls(fetchStub)).toEqual([
      "https://news.example.com",
      "https://www.news.example.com/",
    ]);
    expect(fetchStub).toHaveBeenCalledWith(
      "https://news.example.com",
      expect.objectContaining({ redirect: "manual" })
    );
  });

  it("should reject unsupported schemes", async () => {
    await expect(
      harvestDomains("ftp://files.example.com", { resolver: publicResolver })
    ).rejects.toBeInstanceOf(UnsafeUrlError);
  });

  it("should wrap network failures in PageFetchError", async () => {
    const fetchStub = vi.fn<FetchLike>().mockRejectedValue(new Error("ECONNREFUSED"));

    const error = await harvestDomains("https://down.example.com", {
      fetch: fetchStub,
      resolver: publicResolver,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PageFetchError);
    expect(error).toMatchObject({
      message: "Failed to fetch page https://down.example.com: ECONNREFUSED",
      pageUrl: "https://down.example.com",
    });
  });

  it("should still scan non-OK pages", async () => {
    const fetchStub = createFetchStub({
      "https://gone.example.com": () =>
        htmlResponse('<a href="https://mirror.example.com">mirror</a>', 404),
    });

    const domains = await harvestDomains("https://gone.example.com", {
      fetch: fetchStub,
      resolver: publicResolver,
    });

    expect([...domains]).toEqual(["mirror.example.com"]);
  });
});
