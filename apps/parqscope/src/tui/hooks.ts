import { useStdout } from "ink";
import { useEffect, useState } from "react";

import type { TerminalSize } from "./types.js";

const FALLBACK_SIZE: TerminalSize = { width: 80, height: 24 };

function readSize(stdout: NodeJS.WriteStream): TerminalSize {
  return {
    width: stdout.columns || FALLBACK_SIZE.width,
    height: stdout.rows || FALLBACK_SIZE.height,
  };
}

export function useTerminalDimensions(): TerminalSize {
  const { stdout } = useStdout();
  const [size, setSize] = useState<TerminalSize>(() => readSize(stdout));

  useEffect(() => {
    const onResize = () => setSize(readSize(stdout));
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  return size;
}
