import {
  defaultEditedSuffixes,
  defaultTruncationThreshold,
} from "@/constants";

import {
  type MatchKind,
  type SidecarMatch,
  type SidecarMatcher,
  matchKinds,
} from "./SidecarMatcher";
import {
  type MediaName,
  type SidecarName,
  equalsName,
  isProperPrefix,
  parseMediaName,
  parseSidecarName,
} from "./SidecarName";

type Candidate = SidecarName & { index: number };

export type SidecarMatcherOptions = {
  /** sidecar 檔名（去掉 `.json`）達到此長度才視為可能被截斷 */
  truncationThreshold?: number;
  /** 編輯版檔名後綴，例如 `-edited` */
  editedSuffixes?: readonly string[];
};

/**
 * 依匯出工具的命名規則為媒體檔找 sidecar。
 *
 * 同一種配對方式有多個候選時，取 title 最長者（最長共同前綴），
 * 再相同則取清單中較前面的。
 */
export class SidecarMatcherDefault implements SidecarMatcher {
  private readonly truncationThreshold: number;
  private readonly editedSuffixes: readonly string[];

  constructor(options: SidecarMatcherOptions = {}) {
    this.truncationThreshold =
      options.truncationThreshold ?? defaultTruncationThreshold;
    this.editedSuffixes = (
      options.editedSuffixes ?? defaultEditedSuffixes
    ).map((s) => s.toLowerCase());
  }

  match(
    mediaName: string,
    candidateNames: readonly string[]
  ): SidecarMatch | undefined {
    const media = parseMediaName(mediaName);
    const candidates = parseCandidates(candidateNames);
    for (const kind of matchKinds) {
      const best = this.pickBest(media, kind, candidates);
      if (best) return { mediaName, sidecarName: best.name, kind };
    }
    return undefined;
  }

  matchAll(
    mediaNames: readonly string[],
    candidateNames: readonly string[]
  ): Map<string, SidecarMatch> {
    const result = new Map<string, SidecarMatch>();
    const medias = mediaNames.map(parseMediaName);
    let available = parseCandidates(candidateNames);

    // 逐輪處理：先讓所有 EXACT 配對完成，前綴配對才不會搶走別人的 sidecar
    for (const kind of matchKinds) {
      for (const media of medias) {
        if (result.has(media.name)) continue;
        const best = this.pickBest(media, kind, available);
        if (!best) continue;
        available = available.filter((c) => c.index !== best.index);
        result.set(media.name, {
          mediaName: media.name,
          sidecarName: best.name,
          kind,
        });
      }
    }
    return result;
  }

  private pickBest(
    media: MediaName,
    kind: MatchKind,
    candidates: readonly Candidate[]
  ): Candidate | undefined {
    let best: Candidate | undefined;
    for (const candidate of candidates) {
      if (!this.matches(media, candidate, kind)) continue;
      if (!best || candidate.title.length > best.title.length) {
        best = candidate;
      }
    }
    return best;
  }

  private matches(media: MediaName, c: Candidate, kind: MatchKind) {
    switch (kind) {
      case "EXACT":
        return isExact(media, c);
      case "TRANSPOSED":
        return isTransposed(media, c);
      case "TRUNCATED":
        return this.isTruncated(media, c);
      case "EDITED": {
        const original = this.toOriginalName(media);
        if (!original) return false;
        return (
          isExact(original, c) ||
          isTransposed(original, c) ||
          this.isTruncated(original, c)
        );
      }
    }
  }

  private isTruncated(media: MediaName, c: Candidate) {
    return (
      c.edition === media.edition &&
      c.stemLength >= this.truncationThreshold &&
      isProperPrefix(c.title, media.plainBase, media.ext)
    );
  }

  /** `IMG_0001-edited(1).jpg` → `IMG_0001(1).jpg` */
  private toOriginalName(media: MediaName): MediaName | undefined {
    const lower = media.plainBase.toLowerCase();
    const suffix = this.editedSuffixes.find(
      (s) => s.length > 0 && lower.endsWith(s) && lower.length > s.length
    );
    if (!suffix) return undefined;
    const stripped = media.plainBase.slice(0, -suffix.length);
    const edition = media.edition !== undefined ? `(${media.edition})` : "";
    return parseMediaName(`${stripped}${edition}${media.ext}`);
  }
}

function parseCandidates(names: readonly string[]): Candidate[] {
  const candidates: Candidate[] = [];
  names.forEach((name, index) => {
    const parsed = parseSidecarName(name);
    if (parsed) candidates.push({ ...parsed, index });
  });
  return candidates;
}

function isExact(media: MediaName, c: Candidate) {
  if (c.edition === undefined && equalsName(c.title, media.base, media.ext)) {
    return true;
  }
  return c.edition === media.edition && c.title === media.plainBase;
}

function isTransposed(media: MediaName, c: Candidate) {
  return (
    c.edition !== undefined &&
    c.edition === media.edition &&
    equalsName(c.title, media.plainBase, media.ext)
  );
}
