export const APP_TITLE = "parqscope";

export const TOP_BAR_LINES = 3;
export const FOOTER_LINES = 1;
export const PANEL_BORDER_LINES = 2;
export const TABLE_HEADER_LINES = 2;
export const PANEL_TITLE_LINES = 1;
export const QUERY_INPUT_LINES = 3;
export const BODY_RESERVED_LINES = TOP_BAR_LINES + FOOTER_LINES + PANEL_BORDER_LINES;
export const PANEL_RESERVED_LINES = BODY_RESERVED_LINES + PANEL_TITLE_LINES;
export const TABLE_RESERVED_LINES = BODY_RESERVED_LINES + TABLE_HEADER_LINES;
export const CONTENT_BORDER_WIDTH = 4;

export const DEFAULT_COLUMN_WIDTH = 6;
export const MAX_COLUMN_WIDTH = 40;
export const DETAIL_PAGE_SIZE = 10;
export const DEFAULT_VISIBLE_ROWS = 20;

export const THEME = {
  background: "#1e1f29",
  border: "#44475a",
  accent: "#bd93f9",
  badge: "#50fa7b",
  badgeText: "#1e1f29",
  text: "#c5cee0",
  muted: "#6272a4",
  error: "#ef4444",
  detail: "#f1fa8c",
  query: "#8be9fd",
};
