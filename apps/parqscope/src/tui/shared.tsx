import { Box, Text } from "ink";
import React from "react";

import { APP_TITLE, THEME } from "./constants.js";
import type { ViewId } from "./types.js";
import { VIEWS } from "./views.js";

type InfoRowProps = {
  label: string;
  value: string;
  labelColor?: string;
  valueColor?: string;
};

export function InfoRow({
  label,
  value,
  labelColor = THEME.muted,
  valueColor = THEME.text,
}: InfoRowProps) {
  return (
    <Box flexDirection="row">
      <Box width={24} flexShrink={0}>
        <Text wrap="truncate" color={labelColor}>
          {label}
        </Text>
      </Box>
      <Text wrap="truncate" color={valueColor}>
        {value}
      </Text>
    </Box>
  );
}

type PanelProps = {
  title?: string;
  titleColor?: string;
  borderColor?: string;
  height?: number;
  width?: number | string;
  children: React.ReactNode;
};

export function Panel({
  title,
  titleColor = THEME.accent,
  borderColor = THEME.border,
  height,
  width,
  children,
}: PanelProps) {
  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={borderColor}
      paddingX={1}
      height={height}
      width={width}
      flexGrow={width === undefined ? 1 : 0}
      overflow="hidden"
    >
      {title ? (
        <Text wrap="truncate" bold color={titleColor}>
          {title}
        </Text>
      ) : null}
      {children}
    </Box>
  );
}

type HeaderProps = {
  filePath: string;
  summary: string;
  activeView: ViewId;
};

export function Header({ filePath, summary, activeView }: HeaderProps) {
  const fileName = filePath.split("/").pop() ?? filePath;

  return (
    <Box flexDirection="row" gap={2} width="100%" height={3} borderStyle="single" borderColor={THEME.border} paddingX={1}>
      <Text wrap="truncate" color={THEME.accent}>
        {`◈ ${APP_TITLE}`}
      </Text>
      <Text color={THEME.muted}>{"│"}</Text>
      <Text wrap="truncate" color={THEME.text}>
        {fileName}
      </Text>
      <Text color={THEME.muted}>{"│"}</Text>
      <Text wrap="truncate" color={THEME.muted}>
        {summary}
      </Text>
      <Box flexGrow={1} />
      <Box flexDirection="row" gap={1}>
        {renderTabChips(activeView)}
      </Box>
    </Box>
  );
}

function renderTabChips(activeView: ViewId) {
  return VIEWS.map((view, index) => {
    const isActive = view.id === activeView;
    const label = `${index + 1} ${view.label}`;

    return (
      <Text
        key={`tab-chip-${view.id}`}
        wrap="truncate"
        color={isActive ? THEME.background : THEME.accent}
        backgroundColor={isActive ? THEME.accent : undefined}
      >
        {isActive ? ` [${label}] ` : ` ${label} `}
      </Text>
    );
  });
}

type FooterProps = {
  text: string;
  searching: boolean;
};

export function Footer({ text, searching }: FooterProps) {
  return (
    <Box flexDirection="row" gap={2} width="100%" height={1}>
      <Text color={THEME.badgeText} backgroundColor={THEME.badge}>
        {` ${APP_TITLE} `}
      </Text>
      <Text wrap="truncate" color={searching ? THEME.detail : THEME.muted}>
        {text}
      </Text>
    </Box>
  );
}
