import path from "node:path";

const SUPPLEMENTAL_SUFFIX = ".supplemental-metadata";
const EDITION_RE = /\((\d+)\)$/;

export type SidecarName = {
  name: string;
  /** 去掉 `.json` 後的長度，用來判斷是否被截斷 */
  stemLength: number;
  /** 去掉版本號與 supplemental 後綴後的標題 */
  title: string;
  edition?: number;
};

export type MediaName = {
  name: string;
  /** 原始主檔名，保留 `(n)` */
  base: string;
  /** 去掉 `(n)` 的主檔名 */
  plainBase: string;
  /** 小寫副檔名，含 `.` */
  ext: string;
  edition?: number;
};

export function isSidecarName(name: string) {
  return name.toLowerCase().endsWith(".json") && name.length > ".json".length;
}

/**
 * 解析 sidecar 檔名，例如：
 * - `IMG_0001.jpg.json` → title=IMG_0001.jpg
 * - `IMG_0001.jpg(1).json` → title=IMG_0001.jpg, edition=1
 * - `IMG_0001.jpg.supplemental-metadata(1).json` → title=IMG_0001.jpg, edition=1
 * - `IMG_0001.jpg.supplem.json` → title=IMG_0001.jpg
 */
export function parseSidecarName(name: string): SidecarName | undefined {
  if (!isSidecarName(name)) return undefined;
  const stem = name.slice(0, -".json".length);
  const { rest, edition } = splitEdition(stem);
  const title = stripSupplemental(rest);
  if (title === "") return undefined;
  const parsed: SidecarName = { name, stemLength: stem.length, title };
  if (edition !== undefined) parsed.edition = edition;
  return parsed;
}

export function parseMediaName(name: string): MediaName {
  const ext = path.extname(name);
  const base = name.slice(0, name.length - ext.length);
  const { rest, edition } = splitEdition(base);
  const parsed: MediaName = {
    name,
    base,
    plainBase: rest,
    ext: ext.toLowerCase(),
  };
  if (edition !== undefined) parsed.edition = edition;
  return parsed;
}

function splitEdition(value: string): { rest: string; edition?: number } {
  const m = EDITION_RE.exec(value);
  if (!m || m.index === 0) return { rest: value };
  return { rest: value.slice(0, m.index), edition: Number(m[1]) };
}

/** 移除 `.supplemental-metadata` 或它被截斷後的任意前綴（至少保留 `.`） */
function stripSupplemental(value: string) {
  const idx = value.lastIndexOf(".");
  if (idx <= 0) return value;
  const suffix = value.slice(idx).toLowerCase();
  return SUPPLEMENTAL_SUFFIX.startsWith(suffix) ? value.slice(0, idx) : value;
}

/** title 是否等於 `base + ext`，副檔名不分大小寫 */
export function equalsName(title: string, base: string, ext: string) {
  return (
    title.length === base.length + ext.length &&
    title.startsWith(base) &&
    title.slice(base.length).toLowerCase() === ext
  );
}

/** title 是否為 `base + ext` 的真前綴，副檔名部分不分大小寫 */
export function isProperPrefix(title: string, base: string, ext: string) {
  if (title.length === 0 || title.length >= base.length + ext.length) {
    return false;
  }
  if (title.length <= base.length) return base.startsWith(title);
  return (
    title.startsWith(base) &&
    ext.startsWith(title.slice(base.length).toLowerCase())
  );
}
