import { Box, Text } from "ink";
import React from "react";

import type { RowGroupInfo, RowGroupStats } from "@parqscope/parquet-reader";

import { THEME } from "./constants.js";
import { describeColumnChunk, describeRowGroup, describeRowGroupStats } from "./details.js";
import { InfoRow, Panel } from "./shared.js";
import type { NavigationState } from "./state.js";
import { formatBytes } from "./utils.js";

type RowGroupsViewProps = {
  rowGroups: RowGroupInfo[];
  stats: RowGroupStats;
  nav: NavigationState;
  height: number;
};

export function RowGroupsView({ rowGroups, stats, nav, height }: RowGroupsViewProps) {
  const group = rowGroups[nav.horizontalOffset];
  if (group === undefined) {
    return (
      <Panel title="Row groups" height={height}>
        <Text color={THEME.muted}>{"(file has no row groups)"}</Text>
      </Panel>
    );
  }

  const columns = group.columns.slice(nav.treeScrollOffset, nav.treeScrollOffset + nav.visibleRowCapacity);
  const selectedColumn = nav.verticalOffset > 0 ? group.columns[nav.verticalOffset - 1] : undefined;
  const position =
    selectedColumn === undefined
      ? "all columns"
      : `column ${nav.verticalOffset} of ${group.columns.length}`;

  return (
    <Box flexDirection="row" height={height} gap={1}>
      <Panel title={`Row group ${group.index + 1} of ${rowGroups.length} (${position})`} width="45%">
        {columns.map((chunk, index) => {
          const selected = chunk === selectedColumn;
          return (
            <Text
              key={`chunk-${nav.treeScrollOffset + index}`}
              wrap="truncate"
              color={selected ? THEME.background : THEME.text}
              backgroundColor={selected ? THEME.accent : undefined}
            >
              {`${chunk.path}  ${formatBytes(chunk.compressedBytes)}  ${chunk.codec}`}
            </Text>
          );
        })}
      </Panel>
      {selectedColumn === undefined ? (
        <Panel title="Summary">
          {describeRowGroup(group).map(([label, value]) => (
            <InfoRow key={`group-${label}`} label={label} value={value} />
          ))}
          <Text color={THEME.muted}>{" "}</Text>
          <Text bold color={THEME.accent}>
            {"All row groups"}
          </Text>
          {describeRowGroupStats(stats, rowGroups).map(([label, value]) => (
            <InfoRow key={`stats-${label}`} label={label} value={value} />
          ))}
        </Panel>
      ) : (
        <Panel title={`Column chunk ${selectedColumn.path}`}>
          {describeColumnChunk(selectedColumn).map(([label, value]) => (
            <InfoRow key={label} label={label} value={value} />
          ))}
        </Panel>
      )}
    </Box>
  );
}
