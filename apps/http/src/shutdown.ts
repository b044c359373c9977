// apps/http/src/shutdown.ts

export interface Closable {
  close(): Promise<unknown>;
  log: { error(obj: object, msg: string): void };
}

/** stops taking requests before the store goes away; resolves to the exit code */
export async function shutdown(app: Closable, closeStore: () => Promise<void>): Promise<number> {
  try {
    await app.close();
    await closeStore();
    return 0;
  } catch (err) {
    app.log.error({ err }, 'shutdown-failed');
    return 1;
  }
}
