/**
 * Re-render the consumer whenever the screen buffer flushes.
 */

import { useEffect, useState } from "react";

import type { ScreenBuffer } from "../../lib/screen/buffer.js";

export function useScreen(buffer: ScreenBuffer): number {
  const [version, setVersion] = useState(buffer.version);

  useEffect(() => {
    // A flush may have happened between render and subscribe.
    setVersion(buffer.version);
    return buffer.subscribe(() => setVersion(buffer.version));
  }, [buffer]);

  return version;
}
