/**
 * ForeignTokenSource: rclone's configuration file, read but never written.
 *
 *   [OneDrive]
 *   type = onedrive
 *   token = {"access_token":"...","token_type":"Bearer","refresh_token":"...","expiry":"2025-10-31T01:22:03.598349702+10:00"}
 *   drive_id = ...
 */
import * as fs from 'fs';
import { z } from 'zod';
import { TokenExpiry } from './token-expiry.js';
import type { Token } from '../types/token.js';

export interface IniSection {
  name: string;
  values: Record<string, string>;
}

const RcloneTokenSchema = z.object({
  access_token: z.string(),
  token_type: z.string().default('Bearer'),
  refresh_token: z.string().optional(),
  expiry: z.string().optional(),
  scope: z.string().optional(),
});

export type ForeignTokenRead =
  | { kind: 'ok'; remote: string; token: Token; clientId?: string; clientSecret?: string }
  | { kind: 'missing'; remote?: string; reason: string };

export function parseIni(content: string): IniSection[] {
  const sections: IniSection[] = [];
  let current: IniSection | undefined;
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;
    const header = /^\[(.+)\]$/.exec(line);
    if (header) {
      current = { name: header[1].trim(), values: {} };
      sections.push(current);
      continue;
    }
    const eq = line.indexOf('=');
    if (current && eq > 0) {
      current.values[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
    }
  }
  return sections;
}

/** Strip wrapping quotes, line breaks and whitespace that copy/paste leaves in tokens. */
export function sanitizeAccessToken(raw: string): string {
  return raw.replace(/[\r\n]/g, '').trim().replace(/^"+|"+$/g, '').trim();
}

function isOneDriveSection(section: IniSection): boolean {
  const name = section.name.toLowerCase();
  return section.values.type === 'onedrive' || name.includes('onedrive') || name.includes('sharepoint');
}

export class ForeignTokenSource {
  constructor(readonly configPath: string) {}

  exists(): boolean {
    return fs.existsSync(this.configPath);
  }

  sections(): IniSection[] {
    if (!this.exists()) return [];
    return parseIni(fs.readFileSync(this.configPath, 'utf-8'));
  }

  /** Names of all OneDrive / SharePoint remotes, in file order. */
  remotes(): string[] {
    return this.sections().filter(isOneDriveSection).map((s) => s.name);
  }

  /**
   * Read the token of `remote`, or of the first OneDrive remote when no name is given.
   */
  read(remote?: string): ForeignTokenRead {
    if (!this.exists()) {
      return { kind: 'missing', remote, reason: `rclone config not found at ${this.configPath}` };
    }
    const sections = this.sections();
    const section = remote ? sections.find((s) => s.name === remote) : sections.find(isOneDriveSection);
    if (!section) {
      if (!remote) {
        return { kind: 'missing', remote, reason: `no OneDrive remote in ${this.configPath}` };
      }
      const known = this.remotes();
      const hint = known.length > 0 ? ` (OneDrive remotes: ${known.join(', ')})` : '';
      return { kind: 'missing', remote, reason: `no section [${remote}] in ${this.configPath}${hint}` };
    }
    const blob = section.values.token;
    if (!blob) {
      return { kind: 'missing', remote: section.name, reason: `section [${section.name}] has no token` };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch {
      return { kind: 'missing', remote: section.name, reason: `token of [${section.name}] is not valid JSON` };
    }
    const parsed = RcloneTokenSchema.safeParse(raw);
    if (!parsed.success) {
      return { kind: 'missing', remote: section.name, reason: `token of [${section.name}] has no access_token` };
    }
    const accessToken = sanitizeAccessToken(parsed.data.access_token);
    if (!accessToken) {
      return { kind: 'missing', remote: section.name, reason: `token of [${section.name}] has an empty access_token` };
    }

    return {
      kind: 'ok',
      remote: section.name,
      token: {
        accessToken,
        refreshToken: parsed.data.refresh_token,
        tokenType: parsed.data.token_type,
        scope: parsed.data.scope ?? '',
        expiry: TokenExpiry.detect(parsed.data),
      },
      clientId: section.values.client_id || undefined,
      clientSecret: section.values.client_secret || undefined,
    };
  }
}
