/**
 * Directory tree rendering shared by prompts and the fallback template
 */

import type { StructureEntry } from '../domain/models';

function byName(a: StructureEntry, b: StructureEntry): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Render a listing as a tree: directories first, then files, each alphabetical.
 * Entries past maxItems collapse into a single "... and N more items" line.
 */
export function formatDirectoryTree(structure: readonly StructureEntry[], maxItems: number): string {
  const dirs = structure.filter((item) => item.type === 'dir').sort(byName);
  const files = structure.filter((item) => item.type !== 'dir').sort(byName);
  const all = [...dirs, ...files];
  const shown = all.slice(0, maxItems);
  const hidden = all.length - shown.length;

  const lines = shown.map((item, i) => {
    const isLast = i === shown.length - 1 && hidden === 0;
    const prefix = isLast ? '└── ' : '├── ';
    return `${prefix}${item.name}${item.type === 'dir' ? '/' : ''}`;
  });

  if (hidden > 0) {
    lines.push(`└── ... and ${hidden} more items`);
  }

  return lines.join('\n');
}

/**
 * Find a LICENSE* file at the repository root
 */
export function findLicenseFile(structure: readonly StructureEntry[]): StructureEntry | undefined {
  return structure.find((item) => item.type === 'file' && item.name.toUpperCase().startsWith('LICENSE'));
}
