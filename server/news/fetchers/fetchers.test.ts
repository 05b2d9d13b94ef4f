import { describe, expect, it } from "vitest";
import { parseSerperDate } from "./serper.js";
import { parseYahooRss } from "./yahoo.js";
import { extractParagraphs } from "../scrape.js";

const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("parseSerperDate", () => {
  it("resolves relative ages against now", () => {
    expect(parseSerperDate("45 minutes ago", NOW)).toBe("2024-05-01T11:15:00.000Z");
    expect(parseSerperDate("1 hour ago", NOW)).toBe("2024-05-01T11:00:00.000Z");
    expect(parseSerperDate("3 days ago", NOW)).toBe("2024-04-28T12:00:00.000Z");
    expect(parseSerperDate("1 week ago", NOW)).toBe("2024-04-24T12:00:00.000Z");
  });

  it("reads \"a\", \"an\" and month ages", () => {
    expect(parseSerperDate("an hour ago", NOW)).toBe("2024-05-01T11:00:00.000Z");
    expect(parseSerperDate("a day ago", NOW)).toBe("2024-04-30T12:00:00.000Z");
    expect(parseSerperDate("2 months ago", NOW)).toBe("2024-03-02T12:00:00.000Z");
    expect(parseSerperDate("A Month Ago", NOW)).toBe("2024-04-01T12:00:00.000Z");
  });

  it("accepts absolute dates and falls back to now", () => {
    expect(parseSerperDate("2024-04-02T08:00:00Z", NOW)).toBe("2024-04-02T08:00:00.000Z");
    expect(parseSerperDate("yesterday-ish", NOW)).toBe(NOW.toISOString());
    expect(parseSerperDate(undefined, NOW)).toBe(NOW.toISOString());
  });
});

describe("parseYahooRss", () => {
  const xml = `<rss><channel>
<item><title>Fed &amp; rates</title><link>https://y.example.com/1</link><pubDate>Tue, 30 Apr 2024 20:00:00 GMT</pubDate><description>Rates unchanged</description></item>
<item><title></title><link>https://y.example.com/skip</link></item>
<item><title>No date</title><link>https://y.example.com/2</link></item>
<item><title>Third</title><link>https://y.example.com/3</link></item>
</channel></rss>`;

  it("reads items, decodes entities and respects the limit", () => {
    expect(parseYahooRss(xml, 2, NOW)).toEqual([
      {
        title: "Fed & rates",
        url: "https://y.example.com/1",
        source: "Yahoo",
        publishedAt: "2024-04-30T20:00:00.000Z",
        snippet: "Rates unchanged",
      },
      { title: "No date", url: "https://y.example.com/2", source: "Yahoo", publishedAt: NOW.toISOString(), snippet: null },
    ]);
  });
});

describe("extractParagraphs", () => {
  it("joins paragraph text only", () => {
    const page = "<html><head><title>T</title></head><body><nav>Home</nav><p>First <b>bold</b> line.</p><p>Second.</p></body></html>";
    expect(extractParagraphs(page)).toBe("First bold line. Second.");
  });

  it("returns an empty string when there are no paragraphs", () => {
    expect(extractParagraphs("<div>nothing</div>")).toBe("");
  });
});
