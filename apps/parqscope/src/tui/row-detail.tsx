import { Text } from "ink";
import React from "react";

import { CONTENT_BORDER_WIDTH, THEME } from "./constants.js";
import type { RowDetailContent } from "./frame.js";
import { Panel } from "./shared.js";
import type { RowDetailOverlay } from "./state.js";

type RowDetailProps = {
  detail: RowDetailContent;
  overlay: RowDetailOverlay;
  visibleLines: number;
  width: number;
  height: number;
};

export function RowDetail({ detail, overlay, visibleLines, width, height }: RowDetailProps) {
  const lineWidth = Math.max(1, width - CONTENT_BORDER_WIDTH);
  const lines = detail.lines.slice(overlay.scrollVertical, overlay.scrollVertical + visibleLines);

  return (
    <Panel
      height={height}
      title={detail.title}
      titleColor={detail.error ? THEME.error : THEME.detail}
      borderColor={detail.error ? THEME.error : THEME.detail}
    >
      {lines.map((line, index) => (
        <Text
          key={`detail-${overlay.scrollVertical + index}`}
          wrap="truncate"
          color={detail.error ? THEME.error : THEME.text}
        >
          {line.slice(overlay.scrollHorizontal, overlay.scrollHorizontal + lineWidth)}
        </Text>
      ))}
    </Panel>
  );
}
