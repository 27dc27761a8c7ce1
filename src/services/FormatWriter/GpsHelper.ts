export type Rational = readonly [numerator: number, denominator: number];

export type DmsCoordinate = {
  degrees: Rational;
  minutes: Rational;
  seconds: Rational;
  ref: "N" | "S" | "E" | "W";
};

const SECONDS_DENOMINATOR = 100_000;

/**
 * 十進位度數拆成度、分、秒三組有理數。
 * 正負號以 Ref（N/S、E/W）表示，分子一律為正。
 * 秒保留到小數第五位。
 */
export function toDms(
  value: number,
  axis: "latitude" | "longitude"
): DmsCoordinate {
  const ref =
    axis === "latitude" ? (value < 0 ? "S" : "N") : value < 0 ? "W" : "E";
  const abs = Math.abs(value);
  let degrees = Math.floor(abs);
  const totalMinutes = (abs - degrees) * 60;
  let minutes = Math.floor(totalMinutes);
  let seconds = Math.round((totalMinutes - minutes) * 60 * SECONDS_DENOMINATOR);

  // 四捨五入進位到 60 秒
  if (seconds >= 60 * SECONDS_DENOMINATOR) {
    seconds -= 60 * SECONDS_DENOMINATOR;
    minutes += 1;
  }
  if (minutes >= 60) {
    minutes -= 60;
    degrees += 1;
  }

  return {
    degrees: [degrees, 1],
    minutes: [minutes, 1],
    seconds: [seconds, SECONDS_DENOMINATOR],
    ref,
  };
}

export function rationalToNumber([numerator, denominator]: Rational) {
  return numerator / denominator;
}

export function fromDms(dms: DmsCoordinate): number {
  const abs =
    rationalToNumber(dms.degrees) +
    rationalToNumber(dms.minutes) / 60 +
    rationalToNumber(dms.seconds) / 3600;
  return dms.ref === "S" || dms.ref === "W" ? -abs : abs;
}

/** exiftool 接受以空白分隔的 `度 分 秒` */
export function formatDmsForExifTool(dms: DmsCoordinate): string {
  return [dms.degrees, dms.minutes, dms.seconds]
    .map((r) => String(rationalToNumber(r)))
    .join(" ");
}

/** 約 1 公尺，吸收有理數重新編碼造成的誤差 */
export const COORDINATE_TOLERANCE = 1e-5;

export const ALTITUDE_TOLERANCE = 0.01;

export function isSameCoordinate(a: number, b: number) {
  return Math.abs(a - b) < COORDINATE_TOLERANCE;
}
