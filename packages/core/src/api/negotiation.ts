import { MediaType, MediaTypes } from "../http/media-type";

export type ProducesNegotiation =
  | { type: "acceptable"; mediaType: MediaType }
  | { type: "not-acceptable"; requested: MediaType[] };

export type ConsumesNegotiation =
  | {
      type: "accepted";
      /** The request's content type, `application/octet-stream` when the header is missing. */
      contentType: MediaType;
      /** The consumable type that matched, undefined when the route accepts anything. */
      matched: MediaType | undefined;
    }
  | { type: "unsupported"; contentType: MediaType | null };

type AcceptInput = string | readonly MediaType[] | null | undefined;

interface Candidate {
  mediaType: MediaType;
  quality: number;
  specificity: number;
  index: number;
}

/**
 * Picks the response media type from the client's `Accept` preferences and the types a route can
 * produce.
 *
 * For every producible type, the most specific requested range that matches it is its score (on a
 * tie, the higher `q`, then the earlier entry). A range with `q=0` rules the type out. Scores rank
 * like media types do: the more specific range wins, then the higher quality, then declaration
 * order. So `Accept: *\/*, text/html;q=0.5` prefers an exact `text/html` over anything `*\/*`
 * covers.
 *
 * A wildcard producible type is narrowed to the concrete range that selected it, so `text/*`
 * negotiated against `Accept: text/csv` yields `text/csv`.
 *
 * When the route declares nothing, no negotiation happens and the client's most preferred type
 * (or `*\/*`) is returned; this never fails.
 *
 * @example
 * negotiateProduces("application/json;q=1.0, text/html;q=0.8", [MediaTypes.html, MediaTypes.json]);
 * // => { type: "acceptable", mediaType: application/json }
 */
export function negotiateProduces(
  accept: AcceptInput,
  producible: readonly MediaType[],
): ProducesNegotiation {
  const requested = typeof accept === "string" ? MediaType.parseList(accept) : [...(accept ?? [])];

  if (producible.length === 0) {
    return { type: "acceptable", mediaType: mostPreferred(requested) };
  }

  if (requested.length === 0) {
    return { type: "acceptable", mediaType: producible[0] };
  }

  let best: Candidate | undefined;

  producible.forEach((mediaType, index) => {
    const range = bestRange(mediaType, requested);
    if (!range || range.quality === 0) {
      return;
    }

    const candidate: Candidate = {
      mediaType: narrow(mediaType, range),
      quality: range.quality,
      specificity: range.specificity,
      index,
    };

    if (!best || isBetter(candidate, best)) {
      best = candidate;
    }
  });

  if (!best) {
    return { type: "not-acceptable", requested };
  }

  return { type: "acceptable", mediaType: best.mediaType };
}

/**
 * Checks a request's `Content-Type` against the types a route consumes.
 *
 * Only called for requests that carry a body. A missing header counts as
 * `application/octet-stream`. A route that declares nothing accepts anything.
 */
export function negotiateConsumes(
  contentType: string | MediaType | null | undefined,
  consumable: readonly MediaType[],
): ConsumesNegotiation {
  const parsed =
    contentType instanceof MediaType
      ? contentType
      : contentType
        ? MediaType.tryParse(contentType)
        : MediaTypes.octetStream;

  if (consumable.length === 0) {
    return { type: "accepted", contentType: parsed ?? MediaTypes.octetStream, matched: undefined };
  }

  if (!parsed) {
    return { type: "unsupported", contentType: null };
  }

  const matched = consumable.find((candidate) => candidate.matches(parsed));
  if (!matched) {
    return { type: "unsupported", contentType: parsed };
  }

  return { type: "accepted", contentType: parsed, matched };
}

// The most specific requested range matching `mediaType`; higher q, then header order on a tie.
function bestRange(mediaType: MediaType, requested: readonly MediaType[]): MediaType | undefined {
  let best: MediaType | undefined;

  for (const range of requested) {
    if (!range.matches(mediaType)) {
      continue;
    }

    if (
      !best ||
      range.specificity > best.specificity ||
      (range.specificity === best.specificity && range.quality > best.quality)
    ) {
      best = range;
    }
  }

  return best;
}

function isBetter(candidate: Candidate, current: Candidate): boolean {
  if (candidate.specificity !== current.specificity) {
    return candidate.specificity > current.specificity;
  }
  if (candidate.quality !== current.quality) {
    return candidate.quality > current.quality;
  }
  return candidate.index < current.index;
}

function narrow(producible: MediaType, range: MediaType): MediaType {
  if (!producible.isWildcard || range.specificity <= producible.specificity) {
    return producible;
  }
  return range.withoutParameters();
}

function mostPreferred(requested: readonly MediaType[]): MediaType {
  let best: MediaType | undefined;

  for (const range of requested) {
    if (range.quality === 0) {
      continue;
    }

    if (
      !best ||
      range.specificity > best.specificity ||
      (range.specificity === best.specificity && range.quality > best.quality)
    ) {
      best = range;
    }
  }

  return best ? best.withoutParameters() : MediaTypes.all;
}
