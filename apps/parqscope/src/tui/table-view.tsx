import { Box, Text } from "ink";
import React from "react";

import type { TabularResultSet } from "@parqscope/parquet-reader";

import { CONTENT_BORDER_WIDTH, THEME } from "./constants.js";
import { Panel } from "./shared.js";
import type { NavigationState } from "./state.js";
import { buildTableLines } from "./utils.js";

type TableViewProps = {
  data: TabularResultSet;
  nav: NavigationState;
  width: number;
  height: number;
};

export function TableView({ data, nav, width, height }: TableViewProps) {
  const lines = buildTableLines(data, {
    scroll: nav.dataScrollOffset,
    capacity: nav.visibleRowCapacity,
    columnOffset: nav.horizontalOffset,
    width: Math.max(1, width - CONTENT_BORDER_WIDTH),
  });

  return (
    <Panel height={height}>
      <Text wrap="truncate" bold color={THEME.accent}>
        {lines.header}
      </Text>
      <Text wrap="truncate" color={THEME.border}>
        {lines.separator}
      </Text>
      {lines.rows.length === 0 ? <Text color={THEME.muted}>{"(no rows)"}</Text> : null}
      {lines.rows.map((row, index) => {
        const rowIndex = nav.dataScrollOffset + index;
        const selected = rowIndex === nav.verticalOffset;
        return (
          <Text
            key={`row-${rowIndex}`}
            wrap="truncate"
            color={selected ? THEME.background : THEME.text}
            backgroundColor={selected ? THEME.accent : undefined}
          >
            {row}
          </Text>
        );
      })}
    </Panel>
  );
}

type QueryViewProps = {
  nav: NavigationState;
  width: number;
  height: number;
};

export function QueryView({ nav, width, height }: QueryViewProps) {
  const outcome = nav.queryOutcome;
  const bodyHeight = Math.max(3, height - 3);

  return (
    <Box flexDirection="column" height={height}>
      <Box borderStyle="round" borderColor={THEME.query} paddingX={1} height={3}>
        <Text wrap="truncate" color={THEME.query}>
          {"SQL> "}
        </Text>
        <Text wrap="truncate" color={THEME.text}>
          {nav.queryText}
        </Text>
        <Text color={THEME.muted}>{"▌"}</Text>
      </Box>
      {outcome === null ? (
        <Panel height={bodyHeight} title="Query">
          <Text color={THEME.muted}>{"Type a SQL query and press Enter. The file is available as the table `data`."}</Text>
          <Text color={THEME.muted}>{"Example: SELECT * FROM data LIMIT 10"}</Text>
        </Panel>
      ) : outcome.ok ? (
        <TableView data={outcome.result} nav={nav} width={width} height={bodyHeight} />
      ) : (
        <Panel height={bodyHeight} title="Error" titleColor={THEME.error} borderColor={THEME.error}>
          <Text color={THEME.error}>{outcome.message}</Text>
        </Panel>
      )}
    </Box>
  );
}
