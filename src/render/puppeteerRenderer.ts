import puppeteer, { type Browser } from "puppeteer-core";
import { RenderError, errorMessage } from "../errors.js";
import { CONSENT_BANNER_SELECTORS } from "./consent.js";
import type { RenderOptions, RenderRequest, Renderer } from "./renderer.js";

const SETTLE_MS = 1_000;

/**
 * Headless Chrome renderer. One browser per process, launched on first use;
 * every render gets its own page.
 */
export class PuppeteerRenderer implements Renderer {
  private browser: Promise<Browser> | null = null;

  constructor(private readonly executablePath: string | undefined) {}

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      if (!this.executablePath) {
        throw new RenderError("CHROME_EXECUTABLE_PATH is not set");
      }
      const launching = puppeteer.launch({
        executablePath: this.executablePath,
        headless: true,
        args: [
          "--no-sandbox",
          "--disable-setuid-sandbox",
          "--disable-dev-shm-usage",
          "--disable-gpu",
          "--hide-scrollbars",
          "--force-device-scale-factor=1",
        ],
      });
      // Let the next render try again after a failed launch
      launching.catch(() => {
        this.browser = null;
      });
      this.browser = launching;
    }
    return this.browser;
  }

  async render(req: RenderRequest, opts: RenderOptions): Promise<Uint8Array> {
    const browser = await this.getBrowser();
    const page = await browser.newPage();
    const onAbort = () => {
      page.close().catch((e: unknown) => console.warn(`[renderer] page close failed: ${errorMessage(e)}`));
    };
    opts.signal.addEventListener("abort", onAbort, { once: true });

    try {
      await page.setViewport({ width: req.width, height: req.height, deviceScaleFactor: 1 });
      await page.goto(req.url, { waitUntil: "load", timeout: opts.timeoutMs });
      await page.waitForFunction(() => document.readyState === "complete", { timeout: opts.timeoutMs });

      const hidden = await page.evaluate((selectors: string[]) => {
        let count = 0;
        for (const selector of selectors) {
          try {
            document.querySelectorAll<HTMLElement>(selector).forEach((el) => {
              if (el.style.display !== "none") {
                el.style.display = "none";
                count++;
              }
            });
          } catch {
            // invalid selector in this document; skip it
            continue;
          }
        }
        return count;
      }, CONSENT_BANNER_SELECTORS);
      if (hidden > 0) console.log(`[renderer] hid ${hidden} consent element(s) on ${req.url}`);

      await new Promise((r) => setTimeout(r, SETTLE_MS));
      return await page.screenshot({ type: "png", fullPage: false });
    } catch (e) {
      if (opts.signal.aborted) throw e;
      throw new RenderError(`Failed to render ${req.url}: ${errorMessage(e)}`, e);
    } finally {
      opts.signal.removeEventListener("abort", onAbort);
      if (!page.isClosed()) await page.close();
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const browser = await this.browser;
    this.browser = null;
    await browser.close();
  }
}
