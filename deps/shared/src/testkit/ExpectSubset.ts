import { expect } from "vitest";

/** 只比對 subset 中列出的欄位 */
export function expectHasSubset<T extends object>(
  actual: T,
  subset: Partial<T>
) {
  expect(actual).toMatchObject(subset);
}
