export type AsyncDisposable = {
  [Symbol.asyncDispose](): Promise<void>;
};

/** 依序釋放資源；未傳入的項目略過 */
export async function dispose(
  ...targets: Array<AsyncDisposable | undefined>
): Promise<void> {
  for (const target of targets) {
    if (!target) continue;
    await target[Symbol.asyncDispose]();
  }
}
