import { RenderTimeoutError } from "../errors.js";

export interface RenderRequest {
  url: string;
  width: number;
  height: number;
}

export interface RenderOptions {
  timeoutMs: number;
  /** Aborted when the caller gives up; implementations should stop work. */
  signal: AbortSignal;
}

/** Turns a URL into PNG bytes. */
export interface Renderer {
  render(req: RenderRequest, opts: RenderOptions): Promise<Uint8Array>;
  close?(): Promise<void>;
}

/**
 * Run a render with a hard deadline. On timeout the signal is aborted and a
 * RenderTimeoutError is thrown whether or not the renderer reacts to it.
 */
export async function renderWithTimeout(
  renderer: Renderer,
  req: RenderRequest,
  timeoutMs: number
): Promise<Uint8Array> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new RenderTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([renderer.render(req, { timeoutMs, signal: controller.signal }), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
