import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { TYPES } from "../../di/types";
import { IScriptureProvider } from "../../domain/scripture/ports/IScriptureProvider";
import { LookupResult } from "../../domain/scripture/types";
import { LookupOptions } from "../../domain/scripture/value-objects/LookupOptions";
import { ScriptureReference } from "../../domain/scripture/value-objects/ScriptureReference";
import { ScriptureVersion } from "../../domain/scripture/value-objects/ScriptureVersion";
import { IConfig } from "../../shared/config/IConfig";
import {
  ProviderNetworkError,
  ProviderNotFoundError,
  ProviderRateLimitError,
  ProviderUpstreamError,
} from "../../shared/errors/ScriptureError";
import { ILogger } from "../logging/ILogger";
import {
  httpGet,
  HttpResponse,
  parseJson,
  TransportError,
} from "../http/httpClient";

const PROVIDER = "NET Bible API";

const netVerseSchema = z.object({
  bookname: z.string(),
  chapter: z.coerce.string(),
  verse: z.coerce.string(),
  text: z.string(),
});

const netResponseSchema = z.array(netVerseSchema);

type NetVerse = z.infer<typeof netVerseSchema>;

const LEXICAL_ID_PATTERN = /<st\s+data-num="(\d+)"/g;

/**
 * Rebuild one markup string from the verse list, marking the first verse
 * and every chapter change as `<b>c:v</b>` and the rest as `<b>v</b>`.
 */
export function joinVerses(verses: readonly NetVerse[]): string {
  let chapter: string | null = null;
  return verses
    .map((verse) => {
      const marker =
        verse.chapter !== chapter
          ? `<b>${verse.chapter}:${verse.verse}</b>`
          : `<b>${verse.verse}</b>`;
      chapter = verse.chapter;
      return `${marker} ${verse.text.trim()}`;
    })
    .join(" ");
}

export function canonicalFromVerses(
  reference: ScriptureReference,
  verses: readonly NetVerse[],
): string {
  const first = verses[0];
  const last = verses[verses.length - 1];

  if (reference.isWholeChapter() && first.chapter === last.chapter) {
    return `${first.bookname} ${first.chapter}`;
  }
  if (first.chapter === last.chapter && first.verse === last.verse) {
    return `${first.bookname} ${first.chapter}:${first.verse}`;
  }
  if (first.chapter === last.chapter) {
    return `${first.bookname} ${first.chapter}:${first.verse}-${last.verse}`;
  }
  return `${first.bookname} ${first.chapter}:${first.verse}-${last.chapter}:${last.verse}`;
}

/**
 * New English Translation adapter (labs.bible.org). No credential needed.
 *
 * The full formatting returns inline HTML with footnote anchors and
 * Strong's-numbered lexical tags; it is passed through untouched.
 */
@injectable()
export class NetScriptureProvider implements IScriptureProvider {
  readonly version: ScriptureVersion = "NET";
  readonly name = "New English Translation";

  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ provider: "net" });
  }

  async fetch(
    reference: ScriptureReference,
    _options: LookupOptions,
  ): Promise<LookupResult> {
    const url = new URL(this.config.netApiUrl);
    url.searchParams.set("passage", reference.toString());
    url.searchParams.set("type", "json");
    url.searchParams.set("formatting", "full");

    let response: HttpResponse;
    try {
      response = await httpGet(url.toString(), {
        timeoutMs: this.config.providerTimeoutMs,
      });
    } catch (error) {
      if (error instanceof TransportError) {
        this.logger.error("Error connecting to NET Bible API", error, {
          reference: reference.toString(),
          timedOut: error.timedOut,
        });
        throw new ProviderNetworkError(
          PROVIDER,
          error.timedOut,
          this.config.providerTimeoutMs,
        );
      }
      throw error;
    }

    const { statusCode } = response;

    if (statusCode === 429) {
      this.logger.warn("NET Bible API rate limit hit", {
        reference: reference.toString(),
      });
      throw new ProviderRateLimitError(PROVIDER);
    }

    if (statusCode < 200 || statusCode >= 300) {
      this.logger.warn("NET Bible API returned an error status", {
        reference: reference.toString(),
        statusCode,
      });
      throw new ProviderUpstreamError(
        PROVIDER,
        "NET Bible API request failed. Try again later.",
        statusCode,
      );
    }

    const parsed = netResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new ProviderUpstreamError(
        PROVIDER,
        "NET Bible API returned an unreadable response.",
        statusCode,
      );
    }

    const verses = parsed.data.filter((verse) => verse.text.trim().length > 0);
    if (verses.length === 0) {
      throw new ProviderNotFoundError(PROVIDER);
    }

    const rawText = joinVerses(verses);
    const annotationIds = new Set(
      Array.from(rawText.matchAll(LEXICAL_ID_PATTERN), (match) => match[1]),
    );

    return {
      reference: reference.toString(),
      canonicalReference: canonicalFromVerses(reference, verses),
      version: this.version,
      rawText,
      translationName: this.name,
      annotationIds,
    };
  }
}
