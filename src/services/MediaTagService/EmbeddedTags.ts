export type EmbeddedTags = {
  /** 檔案完整路徑 */
  filePath: string;

  /** EXIF DateTimeOriginal 原始字串，例如 `2023:11:14 22:13:20` */
  dateTimeOriginal?: string;

  /** EXIF DateTimeDigitized，或 QuickTime 的 CreateDate */
  createDate?: string;

  /** 十進位緯度，南緯為負 */
  latitude?: number;

  /** 十進位經度，西經為負 */
  longitude?: number;

  /** 公尺，低於海平面為負 */
  altitude?: number;
};

/** 單一 exiftool 標籤指派，例如 `EXIF:DateTimeOriginal` */
export type TagAssignment = {
  tag: string;
  value: string;
};

export type TagReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string };

export type TagWriteError = {
  type: "WRITE_FAILED";
  message: string;
};
