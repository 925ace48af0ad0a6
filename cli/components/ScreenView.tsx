/**
 * Renders a ScreenBuffer as Ink text rows.
 *
 * Each row becomes one <Text> made of same-style runs; chalk colors the
 * runs according to the palette. Rows are truncated rather than wrapped so
 * the frame never grows taller than the buffer.
 */

import React from "react";
import { Box, Text } from "ink";

import type { ScreenBuffer } from "../../lib/screen/buffer.js";
import { cellColor, type Palette } from "../../lib/theme/ink-colors.js";

import { useScreen } from "../hooks/useScreen.js";

export interface ScreenViewProps {
  buffer: ScreenBuffer;
  palette: Palette;
}

export function ScreenView({ buffer, palette }: ScreenViewProps): React.ReactElement {
  useScreen(buffer);

  const rows: React.ReactElement[] = [];
  for (let y = 0; y < buffer.rows; y++) {
    const text = buffer
      .runs(y)
      .map((run) => cellColor(run.style, palette)(run.text))
      .join("");
    rows.push(
      <Text key={y} wrap="truncate-end">
        {text}
      </Text>,
    );
  }

  return <Box flexDirection="column">{rows}</Box>;
}
