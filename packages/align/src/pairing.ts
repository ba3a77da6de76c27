import path from 'node:path';

const LANG_FILE_RE = /^(.+)_([a-z]{2,8})\.srt$/i;

export interface PairingOptions {
  primaryLang: string;
  secondaryLang: string;
}

export interface FilePair {
  key: string;
  primary: string;
  secondary: string;
}

export interface FilePairing {
  pairs: FilePair[];
  unpaired: string[];
}

/**
 * Group `<base>_<lang>.srt` files by base name. Only the two configured
 * languages count; anything else, and any side without its counterpart, is
 * reported as unpaired.
 */
export function pairSubtitleFiles(names: readonly string[], options: PairingOptions): FilePairing {
  const primaryLang = options.primaryLang.toLowerCase();
  const secondaryLang = options.secondaryLang.toLowerCase();
  const groups = new Map<string, { primary?: string; secondary?: string }>();
  const unpaired: string[] = [];

  for (const name of names) {
    const match = LANG_FILE_RE.exec(path.basename(name));
    const lang = match ? match[2].toLowerCase() : '';
    if (!match || (lang !== primaryLang && lang !== secondaryLang)) {
      unpaired.push(name);
      continue;
    }

    const key = match[1];
    const group = groups.get(key) || {};
    const side = lang === primaryLang ? 'primary' : 'secondary';
    if (group[side]) {
      unpaired.push(name);
      continue;
    }
    group[side] = name;
    groups.set(key, group);
  }

  const pairs: FilePair[] = [];
  for (const [key, group] of groups) {
    if (group.primary && group.secondary) {
      pairs.push({ key, primary: group.primary, secondary: group.secondary });
      continue;
    }
    if (group.primary) unpaired.push(group.primary);
    if (group.secondary) unpaired.push(group.secondary);
  }

  return { pairs, unpaired };
}
