// Field extraction from the quote page markup.
//
// Layout expected under the price info list:
//
//   <ul class="priceinfo">
//     <li><span id="Price1_lbTPrice"><span class="clr-rd">1,712.37</span></span></li>
//     <li><span id="Price1_lbTChange"><span class="clr-rd">▲12.50</span></span></li>
//     <li><span id="Price1_lbTPercent"><span class="clr-rd">+0.74%</span></span></li>
//   </ul>
//
// The page colours a rise red (clr-rd) and a fall green (clr-gr).

import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { Console, Effect, Either } from "effect";
import type { IndexQuote } from "./domain.ts";
import { type ExtractError, ParseError, ValueError } from "./quote-source.ts";

// --- Markup ---

export type QuoteField = keyof IndexQuote;

const REGION_SELECTOR = "ul.priceinfo";

const FIELD_SELECTORS: Record<QuoteField, string> = {
  price: "#Price1_lbTPrice",
  change: "#Price1_lbTChange",
  changePercent: "#Price1_lbTPercent",
};

const FIELD_LABELS: Record<QuoteField, string> = {
  price: "price",
  change: "change",
  changePercent: "change percent",
};

const UP_GLYPH = "▲";
const DOWN_GLYPH = "▼";
const UP_CLASS = "clr-rd";
const DOWN_CLASS = "clr-gr";

// --- Pure helpers ---

export type Direction = "up" | "down" | "unknown";

/** Direction from the glyph in the text or the element's first class. */
export function classifyDirection(
  text: string,
  className: string | undefined,
): Direction {
  if (text.includes(DOWN_GLYPH) || className === DOWN_CLASS) return "down";
  if (text.includes(UP_GLYPH) || className === UP_CLASS) return "up";
  return "unknown";
}

/** Drop thousands separators, direction glyphs and the percent sign. */
export function cleanNumber(text: string): string {
  return text.replace(/[,▲▼%]/g, "").trim();
}

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function parseDecimal(cleaned: string): number | undefined {
  return DECIMAL.test(cleaned) ? Number(cleaned) : undefined;
}

/** An explicit minus sign wins; otherwise a falling direction negates. */
export function correctSign(
  value: number,
  cleaned: string,
  direction: Direction,
): number {
  if (cleaned.startsWith("-")) return value;
  return direction === "down" && value !== 0 ? -value : value;
}

// --- Extraction ---

function readField(
  region: Cheerio<Element>,
  field: QuoteField,
): Effect.Effect<number, ExtractError> {
  const label = FIELD_LABELS[field];
  const element = region.find(FIELD_SELECTORS[field]).first().find("span").first();

  if (element.length === 0) {
    return Effect.fail(new ParseError({ message: `Could not find ${label} element` }));
  }

  const raw = element.text().trim();
  const cleaned = cleanNumber(raw);
  const value = parseDecimal(cleaned);

  if (value === undefined) {
    return Effect.fail(new ValueError({ message: `Could not parse ${label} from "${raw}"` }));
  }
  if (field === "price") return Effect.succeed(value);

  const className = element.attr("class")?.trim().split(/\s+/)[0];
  const direction = classifyDirection(raw, className);

  return (
    direction === "unknown"
      ? Console.warn(
          `[extract] unrecognized direction for ${label} (class=${className ?? "none"}), sign left as-is`,
        )
      : Effect.void
  ).pipe(Effect.as(correctSign(value, cleaned, direction)));
}

/**
 * Read price, change and change percent from a parsed quote page.
 *
 * Every field is attempted; each failure is logged, and the first one (in
 * price, change, percent order) is returned. A partial quote is never
 * produced.
 */
export function extractQuote(
  $: CheerioAPI,
): Effect.Effect<IndexQuote, ExtractError> {
  const region = $(REGION_SELECTOR).first();

  if (region.length === 0) {
    return Effect.fail(new ParseError({ message: "Could not find price info region" }));
  }

  return Effect.all(
    [
      readField(region, "price"),
      readField(region, "change"),
      readField(region, "changePercent"),
    ],
    { mode: "either" },
  ).pipe(
    Effect.flatMap((results) =>
      Effect.forEach(
        results.filter(Either.isLeft),
        (failure) => Console.warn(`[extract] ${failure.left._tag}: ${failure.left.message}`),
        { discard: true },
      ).pipe(Effect.zipRight(Either.all(results))),
    ),
    Effect.map(([price, change, changePercent]) => ({ price, change, changePercent })),
  );
}
