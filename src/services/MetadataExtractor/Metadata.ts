export type GpsLocation = {
  /** 十進位度數，南緯為負 */
  latitude: number;
  /** 十進位度數，西經為負 */
  longitude: number;
  /** 公尺，低於海平面為負 */
  altitude?: number;
};

/**
 * 從 sidecar 整理出的最小 metadata。
 * 經緯度只會同時存在或同時缺席，因此以單一 gps 物件表示。
 */
export type CanonicalMetadata = {
  /** 拍攝時間（UTC 瞬間） */
  takenAt: Date;
  gps?: GpsLocation;
};
