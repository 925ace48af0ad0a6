/**
 * Terminal mode switches around the Ink session.
 *
 * Ink renders from the cursor position, so the app first moves to the
 * alternate screen and homes the cursor; screen coordinates in mouse
 * reports then match buffer coordinates. Mouse reporting uses button
 * events (1000) in SGR encoding (1006).
 */

const ESC = "\x1b";
const CSI = `${ESC}[`;

export const TERMINAL_MODES = {
  altScreenOn: `${CSI}?1049h`,
  altScreenOff: `${CSI}?1049l`,
  home: `${CSI}H`,
  clear: `${CSI}2J`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  mouseOn: `${CSI}?1000h${CSI}?1006h`,
  mouseOff: `${CSI}?1006l${CSI}?1000l`,
} as const;

export interface TerminalOutput {
  write(chunk: string): boolean;
}

/**
 * Enter the alternate screen with mouse reporting on. Returns a restore
 * function that undoes it; calling it more than once is harmless.
 */
export function enterFullscreen(out: TerminalOutput): () => void {
  out.write(
    TERMINAL_MODES.altScreenOn +
      TERMINAL_MODES.clear +
      TERMINAL_MODES.home +
      TERMINAL_MODES.hideCursor +
      TERMINAL_MODES.mouseOn,
  );

  let restored = false;
  return () => {
    if (restored) return;
    restored = true;
    out.write(
      TERMINAL_MODES.mouseOff + TERMINAL_MODES.showCursor + TERMINAL_MODES.altScreenOff,
    );
  };
}
