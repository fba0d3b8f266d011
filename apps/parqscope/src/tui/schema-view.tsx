import { Box, Text } from "ink";
import React from "react";

import type { SchemaLine } from "@parqscope/parquet-reader";

import { THEME } from "./constants.js";
import { schemaTableCapacity } from "./frame.js";
import { Panel } from "./shared.js";
import { buildTableLines } from "./utils.js";
import { buildSchemaTable, getSchemaLeaves } from "./views.js";
import type { NavigationState } from "./state.js";

type SchemaViewProps = {
  schema: SchemaLine[];
  nav: NavigationState;
  height: number;
  width: number;
};

export function formatSchemaLine(line: SchemaLine): string {
  const indent = "  ".repeat(line.depth);
  if (line.kind === "group") {
    const logical = line.logicalType ? ` (${line.logicalType})` : "";
    return `${indent}${line.name}: group ${line.repetition.toLowerCase()}${logical}`;
  }
  const logical = line.logicalType ? ` (${line.logicalType})` : "";
  return `${indent}${line.name}: ${line.physicalType}${logical} ${line.repetition.toLowerCase()}`;
}

export function SchemaView({ schema, nav, height, width }: SchemaViewProps) {
  const leaves = getSchemaLeaves(schema);
  const selectedLeaf = nav.verticalOffset > 0 ? leaves[nav.verticalOffset - 1] : undefined;
  const treeLines = schema.slice(nav.treeScrollOffset, nav.treeScrollOffset + nav.visibleRowCapacity);

  const table = buildSchemaTable(schema);
  const tableWidth = Math.max(1, Math.floor(width / 2) - 4);
  const tableCapacity = schemaTableCapacity(nav.visibleRowCapacity);
  const selectedRow = selectedLeaf === undefined ? -1 : nav.verticalOffset - 1;
  const tableScroll = nav.dataScrollOffset;
  const lines = buildTableLines(table, {
    scroll: tableScroll,
    capacity: tableCapacity,
    columnOffset: nav.horizontalOffset,
    width: tableWidth,
  });

  return (
    <Box flexDirection="row" height={height} gap={1}>
      <Panel title={`Schema (${leaves.length} columns)`} width="50%">
        {treeLines.map((line, index) => {
          const selected = line === selectedLeaf;
          return (
            <Text
              key={`schema-${nav.treeScrollOffset + index}`}
              wrap="truncate"
              color={selected ? THEME.background : line.kind === "group" ? THEME.accent : THEME.text}
              backgroundColor={selected ? THEME.accent : undefined}
            >
              {formatSchemaLine(line)}
            </Text>
          );
        })}
      </Panel>
      <Panel title="Columns">
        <Text wrap="truncate" bold color={THEME.accent}>
          {lines.header}
        </Text>
        <Text wrap="truncate" color={THEME.border}>
          {lines.separator}
        </Text>
        {lines.rows.map((row, index) => {
          const selected = tableScroll + index === selectedRow;
          return (
            <Text
              key={`schema-row-${tableScroll + index}`}
              wrap="truncate"
              color={selected ? THEME.background : THEME.text}
              backgroundColor={selected ? THEME.accent : undefined}
            >
              {row}
            </Text>
          );
        })}
      </Panel>
    </Box>
  );
}
