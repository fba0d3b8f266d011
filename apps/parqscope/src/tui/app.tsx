import { Box, useApp, useInput } from "ink";
import React, { useMemo, useRef, useState } from "react";

import { FOOTER_LINES, TOP_BAR_LINES } from "./constants.js";
import { createExplorerState, handleKey, type ExplorerState } from "./coordinator.js";
import { buildFooter, buildRowDetail, detailVisibleLines, prepareFrame } from "./frame.js";
import { useTerminalDimensions } from "./hooks.js";
import { toKeyEvents } from "./keys.js";
import { MetadataView } from "./metadata-view.js";
import { RowDetail } from "./row-detail.js";
import { RowGroupsView } from "./row-groups-view.js";
import { SchemaView } from "./schema-view.js";
import { Footer, Header } from "./shared.js";
import { QueryView, TableView } from "./table-view.js";
import type { ExplorerContext, TerminalSize } from "./types.js";
import { formatBigInt } from "./utils.js";
import { getBrowseData } from "./views.js";

type AppProps = {
  context: ExplorerContext;
  initialState?: ExplorerState;
};

export function App({ context, initialState }: AppProps) {
  const { exit } = useApp();
  const size = useTerminalDimensions();
  const [state, setState] = useState<ExplorerState>(() => initialState ?? createExplorerState());

  const prepared = useMemo(() => prepareFrame(state, context, size), [state, context, size]);
  const preparedRef = useRef(prepared);
  preparedRef.current = prepared;

  useInput((input, key) => {
    let next = preparedRef.current;
    for (const event of toKeyEvents(input, key)) {
      const result = handleKey(next, event, context);
      if (result.exit) {
        exit();
        return;
      }
      next = prepareFrame(result.state, context, size);
    }
    if (next !== preparedRef.current) {
      preparedRef.current = next;
      setState(next);
    }
  });

  const { overview } = context.file;
  const summary = `rows ${formatBigInt(overview.rowCount)} | cols ${overview.columnCount} | groups ${overview.rowGroupCount}`;
  const bodyHeight = Math.max(1, size.height - TOP_BAR_LINES - FOOTER_LINES);

  return (
    <Box flexDirection="column" width={size.width} height={size.height}>
      <Header filePath={context.filePath} summary={summary} activeView={prepared.activeView} />
      {renderBody(prepared, context, size, bodyHeight)}
      <Footer text={buildFooter(prepared)} searching={prepared.nav.overlay?.kind === "search"} />
    </Box>
  );
}

function renderBody(
  state: ExplorerState,
  context: ExplorerContext,
  size: TerminalSize,
  height: number,
) {
  const { nav } = state;
  if (nav.overlay?.kind === "detail") {
    return (
      <RowDetail
        detail={buildRowDetail(state.activeView, nav, context)}
        overlay={nav.overlay}
        visibleLines={detailVisibleLines(size)}
        width={size.width}
        height={height}
      />
    );
  }

  switch (state.activeView) {
    case "metadata":
      return <MetadataView overview={context.file.overview} height={height} />;
    case "schema":
      return <SchemaView schema={context.file.schema} nav={nav} width={size.width} height={height} />;
    case "row-groups":
      return (
        <RowGroupsView
          rowGroups={context.file.rowGroups}
          stats={context.file.rowGroupStats}
          nav={nav}
          height={height}
        />
      );
    case "browse":
      return <TableView data={getBrowseData(nav, context)} nav={nav} width={size.width} height={height} />;
    case "query":
      return <QueryView nav={nav} width={size.width} height={height} />;
  }
}
