import type { SubtitleSettings } from "@storyreel/shared";

export type SubtitleFilterStyle = Pick<
  SubtitleSettings,
  "fontName" | "fontSize" | "fontColor" | "outlineColor" | "outlineWidth" | "marginBottom"
>;

/**
 * RRGGBB to BBGGRR, the byte order ASS style strings expect. Anything that is
 * not exactly six hex digits after the leading `#` comes back as is.
 */
export function reverseHexColor(hex: string): string {
  const value = hex.replace(/^#+/, "");
  if (!/^[0-9a-fA-F]{6}$/.test(value)) {
    return value;
  }
  return `${value.slice(4, 6)}${value.slice(2, 4)}${value.slice(0, 2)}`;
}

/** Windows separators become forward slashes; elsewhere a backslash is part of the name. */
export function escapeFilterPath(filePath: string, platform: NodeJS.Platform = process.platform): string {
  const normalized = platform === "win32" ? filePath.replace(/\\/g, "/") : filePath;
  return normalized.replace(/:/g, "\\:").replace(/'/g, "\\'");
}

export function buildForceStyle(style: SubtitleFilterStyle): string {
  return [
    `FontName=${style.fontName}`,
    `FontSize=${style.fontSize}`,
    `PrimaryColour=&H00${reverseHexColor(style.fontColor)}`,
    `OutlineColour=&H00${reverseHexColor(style.outlineColor)}`,
    `Outline=${style.outlineWidth}`,
    "Shadow=1",
    // bottom centre
    "Alignment=2",
    `MarginV=${style.marginBottom}`
  ].join(",");
}

export function buildSubtitleFilter(
  srtPath: string,
  style: SubtitleFilterStyle,
  options: { forceStyle?: boolean } = {}
): string {
  const escaped = escapeFilterPath(srtPath);
  if (options.forceStyle === false) {
    return `subtitles='${escaped}'`;
  }
  return `subtitles='${escaped}':force_style='${buildForceStyle(style)}'`;
}
