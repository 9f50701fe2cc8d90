import path from 'path';
import type { ArchiveEntries, IconSample, IconTable } from '../../shared/types';
import { createLogger } from '../../shared/logger';
import { byName } from './color-mapper';
import { pngName } from './svg-converter';

const log = createLogger({ module: 'icon-mapper' });

export interface IconMapOptions {
  /** Directory inside the archive that holds the theme, e.g. `adwaita-icon-theme-master-Adwaita/Adwaita`. */
  archiveRoot: string;
  /** Rasterizes an SVG; throws when the conversion fails. */
  convert: (svg: Buffer, svgName: string) => Buffer;
}

/** Archive paths the icon table needs, for filtering while extracting. */
export function wantedPaths(table: IconTable, archiveRoot: string): Set<string> {
  const paths = new Set<string>();
  for (const iconPath of Object.values(table.icons)) {
    if (iconPath !== '') paths.add(path.posix.join(archiveRoot, iconPath));
  }
  return paths;
}

/**
 * Resolve every mapped icon against the archive. Icons without a chosen
 * asset are skipped silently; a missing asset or a failed conversion is
 * logged and skipped.
 */
export function mapIcons(entries: ArchiveEntries, table: IconTable, options: IconMapOptions): IconSample[] {
  const forcePng = new Set(table.forcePng);
  const icons: IconSample[] = [];
  let unmapped = 0;

  for (const [name, iconPath] of Object.entries(table.icons)) {
    if (iconPath === '') {
      unmapped++;
      continue;
    }

    const archivePath = path.posix.join(options.archiveRoot, iconPath);
    const svg = entries.get(archivePath);
    if (svg === undefined) {
      log.warn({ name, path: archivePath }, 'Error bundling icon: not found in archive');
      continue;
    }

    let staticName = path.posix.basename(iconPath);
    let content = svg;
    if (forcePng.has(name)) {
      try {
        content = options.convert(svg, staticName);
        staticName = pngName(staticName);
      } catch (err) {
        log.warn({ name, path: archivePath, err }, 'Error bundling icon: conversion failed');
        continue;
      }
    }

    icons.push({ name, staticName, content, themed: staticName.includes('symbolic') });
  }

  icons.sort(byName);
  log.info({ icons: icons.length, unmapped }, 'Mapped icons');
  return icons;
}
