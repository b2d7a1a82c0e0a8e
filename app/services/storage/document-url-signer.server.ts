import { createHmac } from "crypto";
import { Errors } from "../../utils/errors";

export interface DocumentUrlSigner {
  signedReadUrl(storageKey: string, ttlSeconds: number): Promise<string>;
}

export interface HmacDocumentUrlSignerOptions {
  baseUrl: string;
  secret: string;
  now?: () => Date;
}

/**
 * Issues `<base>/<key>?expires=<unix>&signature=<hex>` links that the
 * document gateway verifies with the same secret.
 */
export class HmacDocumentUrlSigner implements DocumentUrlSigner {
  private readonly baseUrl: string;
  private readonly secret: string;
  private readonly now: () => Date;

  constructor(options: HmacDocumentUrlSignerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.secret = options.secret;
    this.now = options.now ?? (() => new Date());
  }

  async signedReadUrl(storageKey: string, ttlSeconds: number): Promise<string> {
    if (!this.secret) {
      throw Errors.internal("document url signing secret is not configured");
    }
    const key = storageKey.replace(/^\/+/, "");
    const expires = Math.floor(this.now().getTime() / 1000) + ttlSeconds;
    const signature = createHmac("sha256", this.secret).update(`${key}:${expires}`).digest("hex");
    const encodedKey = key.split("/").map(encodeURIComponent).join("/");
    return `${this.baseUrl}/${encodedKey}?expires=${expires}&signature=${signature}`;
  }
}
