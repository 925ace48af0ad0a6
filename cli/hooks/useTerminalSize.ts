/**
 * Terminal resize notifications.
 *
 * Calls `onResize(columns, rows)` on every stdout `resize` event. Cleans up
 * on unmount.
 */

import { useEffect, useRef } from "react";
import { useStdout } from "ink";

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

export function useTerminalSize(onResize: (columns: number, rows: number) => void): void {
  const { stdout } = useStdout();

  // Latest callback without re-subscribing on every render.
  const callbackRef = useRef(onResize);
  callbackRef.current = onResize;

  useEffect(() => {
    const handleResize = () => {
      callbackRef.current(
        stdout.columns ?? FALLBACK_COLUMNS,
        stdout.rows ?? FALLBACK_ROWS,
      );
    };
    stdout.on("resize", handleResize);
    return () => {
      stdout.off("resize", handleResize);
    };
  }, [stdout]);
}
