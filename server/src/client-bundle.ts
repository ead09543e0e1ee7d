import { fileURLToPath } from "node:url";

import { build } from "esbuild";

const BROWSER_ENTRY = fileURLToPath(new URL("../../packages/client/src/browser.ts", import.meta.url));

/**
 * The browser poller, bundled from its TypeScript sources on first use and kept in memory.
 */
export class ClientBundle {
  private readonly entryPoint: string;
  private pending: Promise<string> | null = null;

  constructor(entryPoint: string = BROWSER_ENTRY) {
    this.entryPoint = entryPoint;
  }

  load(): Promise<string> {
    if (!this.pending) {
      this.pending = this.bundle().catch((error: unknown) => {
        this.pending = null;
        throw error;
      });
    }

    return this.pending;
  }

  private async bundle(): Promise<string> {
    const result = await build({
      entryPoints: [this.entryPoint],
      bundle: true,
      write: false,
      format: "esm",
      platform: "browser",
      target: "es2020",
      logLevel: "silent"
    });

    const output = result.outputFiles?.[0];
    if (!output) {
      throw new Error(`bundling ${this.entryPoint} produced no output`);
    }

    return output.text;
  }
}
