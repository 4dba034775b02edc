/**
 * Parsing of the structured record contents Cloudflare shows as plain text
 *
 * SRV: "<weight> <port> <target>" (priority is a separate field)
 * CAA: "<flags> <tag> <value>", value optionally quoted
 */
import { CAA_TAGS, type CAATag } from '../types/index.js';

export interface SrvData {
  weight: number;
  port: number;
  target: string;
}

export interface CaaData {
  flags: number;
  tag: CAATag;
  value: string;
}

const SRV_PATTERN = /^(\d{1,5})\s+(\d{1,5})\s+(\S+)$/;
const CAA_PATTERN = /^(\d{1,3})\s+(\S+)\s+(.+)$/;

function isCaaTag(value: string): value is CAATag {
  return (CAA_TAGS as readonly string[]).includes(value);
}

export function parseSrvContent(content: string): SrvData | null {
  const match = SRV_PATTERN.exec(content.trim());
  if (!match?.[1] || !match[2] || !match[3]) return null;

  const weight = Number(match[1]);
  const port = Number(match[2]);
  if (weight > 65535 || port > 65535) return null;

  return { weight, port, target: match[3] };
}

export function parseCaaContent(content: string): CaaData | null {
  const match = CAA_PATTERN.exec(content.trim());
  if (!match?.[1] || !match[2] || !match[3]) return null;

  const flags = Number(match[1]);
  const tag = match[2].toLowerCase();
  if (flags > 255 || !isCaaTag(tag)) return null;

  const value = match[3].replace(/^"(.*)"$/, '$1');
  return value ? { flags, tag, value } : null;
}
