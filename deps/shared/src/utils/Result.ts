export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };

/**
 * 以值表達成功或失敗，取代 throw。
 * 服務層一律回傳 Result，由呼叫端決定如何處理錯誤。
 */
export type Result<T, E> = Ok<T> | Err<E>;

export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok<T>(value?: T): Ok<T | undefined> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}
