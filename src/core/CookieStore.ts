import { promises as fs } from 'fs';
import { z } from 'zod';
import { Cookie, CookieJar } from 'tough-cookie';
import { createLogger } from './Logger';

const logger = createLogger('CookieStore');

// Fields beyond key/value are kept verbatim for tough-cookie to restore
const SerializedCookieSchema = z
  .object({
    key: z.string(),
    value: z.string(),
    domain: z.string().nullable().optional(),
    path: z.string().nullable().optional(),
    expires: z.string().nullable().optional(),
  })
  .passthrough();

const CookieFileSchema = z.array(SerializedCookieSchema);

/**
 * CookieStore wraps the cookie jar shared by every request of a client and
 * persists the cookies of one site to a JSON file.
 */
export class CookieStore {
  private readonly jar: CookieJar;

  constructor() {
    this.jar = new CookieJar();
  }

  /**
   * Cookie header value for a request to `url`, or undefined when none apply
   */
  async getCookieHeader(url: string): Promise<string | undefined> {
    const header = await this.jar.getCookieString(url);
    return header || undefined;
  }

  /**
   * Store the Set-Cookie headers of a response. Malformed cookies are skipped.
   */
  async storeSetCookies(url: string, setCookies: readonly string[]): Promise<void> {
    for (const setCookie of setCookies) {
      await this.jar.setCookie(setCookie, url, { ignoreError: true });
    }
  }

  async setCookie(cookie: string | Cookie, siteURL: string): Promise<void> {
    await this.jar.setCookie(cookie, new URL(siteURL).toString());
  }

  async getCookies(siteURL: string): Promise<Cookie[]> {
    return this.jar.getCookies(new URL(siteURL).toString());
  }

  /**
   * Write the cookies scoped to `siteURL` to `filePath`, replacing its contents
   */
  async exportToFile(filePath: string, siteURL: string): Promise<void> {
    const cookies = await this.getCookies(siteURL);
    const data = JSON.stringify(
      cookies.map((cookie) => cookie.toJSON()),
      null,
      2
    );

    await fs.writeFile(filePath, data, 'utf-8');
    logger.debug(`Exported ${cookies.length} cookie(s) for ${siteURL} to ${filePath}`);
  }

  /**
   * Load cookies from `filePath` into the jar for `siteURL`.
   * Nothing is installed unless every cookie is accepted.
   */
  async importFromFile(filePath: string, siteURL: string): Promise<void> {
    const site = new URL(siteURL).toString();
    const content = await fs.readFile(filePath, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse cookie file ${filePath}: ${message}`);
    }

    const result = CookieFileSchema.safeParse(raw);
    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('\n');
      throw new Error(`Invalid cookie file ${filePath}:\n${errors}`);
    }

    const cookies = result.data.map((record, index) => {
      const cookie = Cookie.fromJSON(record);
      if (!cookie) {
        throw new Error(`Invalid cookie file ${filePath}: record ${index} is not a cookie`);
      }
      return cookie;
    });

    // Dry run so a rejected cookie leaves the live jar untouched
    const scratch = new CookieJar();
    for (const cookie of cookies) {
      await scratch.setCookie(cookie, site);
    }

    for (const cookie of cookies) {
      await this.jar.setCookie(cookie, site);
    }
    logger.debug(`Imported ${cookies.length} cookie(s) for ${siteURL} from ${filePath}`);
  }
}
