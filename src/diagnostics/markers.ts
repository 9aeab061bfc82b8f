import type { Diagnostic } from "./types.js";

export const DEFAULT_MARKERS = ["sorry", "admit"];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Placeholder markers that keep a clean build from counting as finished work. */
export const lintMarkers = (source: string, markers: readonly string[] = DEFAULT_MARKERS): string[] =>
  markers
    .filter((marker) => marker.length > 0 && new RegExp(`\\b${escapeRegExp(marker)}\\b`).test(source))
    .map((marker) => `contains \`${marker}\``);

export const markerDiagnostics = (file: string, issues: string[]): Diagnostic[] =>
  issues.map((message): Diagnostic => ({ severity: "error", kind: "marker", message, file }));
