import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { TYPES } from "../../di/types";
import { ICommentaryLookup } from "../../domain/scripture/ports/ICommentaryLookup";
import {
  CommentaryResult,
  CommentarySource,
} from "../../domain/scripture/types";
import { ScriptureReference } from "../../domain/scripture/value-objects/ScriptureReference";
import { IConfig } from "../../shared/config/IConfig";
import { ILogger } from "../logging/ILogger";
import { httpGet, parseJson } from "../http/httpClient";
import { cleanCommentaryText } from "./cleanCommentaryText";

const commentaryResponseSchema = z.object({
  commentary: z.object({ name: z.string() }).partial().optional(),
  entries: z
    .array(
      z.object({
        verse_start: z.number().int(),
        verse_end: z.number().int(),
        text: z.string(),
      }),
    )
    .default([]),
});

/**
 * Commentariat API client
 *
 * Verse references ask for the first verse's commentary, chapter
 * references for the whole chapter. Lookups are best-effort: anything
 * other than a usable answer resolves to null.
 */
@injectable()
export class CommentariatClient implements ICommentaryLookup {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ service: "commentariat" });
  }

  async lookup(
    reference: string,
    source: CommentarySource,
  ): Promise<CommentaryResult | null> {
    let parsed: ScriptureReference;
    try {
      parsed = ScriptureReference.parse(reference);
    } catch (error) {
      this.logger.warn("Could not parse reference for commentary", {
        reference,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const segments = [
      "commentaries",
      source,
      parsed.book,
      String(parsed.chapter),
      ...(parsed.verseStart !== null ? [String(parsed.verseStart)] : []),
    ];
    const url = new URL(
      segments.map(encodeURIComponent).join("/"),
      this.config.commentaryApiUrl.endsWith("/")
        ? this.config.commentaryApiUrl
        : `${this.config.commentaryApiUrl}/`,
    );

    try {
      const response = await httpGet(url.toString(), {
        timeoutMs: this.config.commentaryTimeoutMs,
      });

      if (response.statusCode === 404) {
        return null;
      }

      if (response.statusCode < 200 || response.statusCode >= 300) {
        this.logger.warn("Commentary lookup failed", {
          reference,
          source,
          statusCode: response.statusCode,
        });
        return null;
      }

      const body = commentaryResponseSchema.safeParse(parseJson(response.text));
      if (!body.success) {
        this.logger.warn("Commentary response was not understood", {
          reference,
          source,
        });
        return null;
      }

      const entries = body.data.entries.map((entry) => ({
        verseStart: entry.verse_start,
        verseEnd: entry.verse_end,
        text: cleanCommentaryText(entry.text),
      }));

      if (entries.length === 0) {
        return null;
      }

      return {
        source,
        sourceName: body.data.commentary?.name ?? source,
        reference,
        entries,
      };
    } catch (error) {
      this.logger.warn("Commentary lookup error", {
        reference,
        source,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
