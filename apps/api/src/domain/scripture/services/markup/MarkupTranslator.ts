import { TranslationResult } from "../../types";
import { LookupOptions } from "../../value-objects/LookupOptions";
import {
  collapseSpaces,
  convertLexicalTags,
  convertVerseMarkers,
  prependChapterMarker,
  removeFootnoteAnchors,
  removeFootnoteMarkers,
  stripHeadingAndFootnoteSection,
  stripRemainingTags,
  stripTranslationLabel,
} from "./passes";

interface PassContext {
  reference: string;
  options: LookupOptions;
  annotationIds: Set<string>;
}

type MarkupPass = (text: string, ctx: PassContext) => string;

const MARKUP_PASSES: ReadonlyArray<MarkupPass> = [
  (text, ctx) =>
    stripHeadingAndFootnoteSection(text, ctx.options.includeHeadings),
  (text, ctx) => removeFootnoteMarkers(text, ctx.options.includeFootnotes),
  (text) => stripTranslationLabel(text),
  (text) => removeFootnoteAnchors(text),
  (text, ctx) => convertVerseMarkers(text, ctx.options.includeVerseNumbers),
  (text, ctx) => {
    const result = convertLexicalTags(
      text,
      ctx.options.suppressCrossReferenceLinks,
    );
    result.annotationIds.forEach((id) => ctx.annotationIds.add(id));
    return result.text;
  },
  (text, ctx) =>
    prependChapterMarker(text, ctx.reference, ctx.options.includeVerseNumbers),
  (text) => collapseSpaces(stripRemainingTags(text)),
];

/**
 * Convert provider text/markup into scripture.sty macros.
 *
 * `reference` is only used to derive the chapter marker.
 */
export function translateMarkup(
  rawText: string,
  reference: string,
  options: LookupOptions,
): TranslationResult {
  const ctx: PassContext = {
    reference,
    options,
    annotationIds: new Set<string>(),
  };

  const body = MARKUP_PASSES.reduce((text, pass) => pass(text, ctx), rawText);

  return { body, annotationIds: ctx.annotationIds };
}
