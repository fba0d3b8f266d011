import { Box, Text } from "ink";
import React from "react";

import type { FileOverview } from "@parqscope/parquet-reader";

import { THEME } from "./constants.js";
import { describeKeyValueMetadata, describeOverview } from "./details.js";
import { InfoRow, Panel } from "./shared.js";

type MetadataViewProps = {
  overview: FileOverview;
  height: number;
};

export function MetadataView({ overview, height }: MetadataViewProps) {
  const keyValues = describeKeyValueMetadata(overview);

  return (
    <Box flexDirection="row" height={height} gap={1}>
      <Panel title="File">
        {describeOverview(overview).map(([label, value]) => (
          <InfoRow key={label} label={label} value={value} />
        ))}
      </Panel>
      <Panel title="Key/value metadata">
        {keyValues.length === 0 ? (
          <Text color={THEME.muted}>{"(none)"}</Text>
        ) : (
          keyValues.map(([key, value]) => (
            <InfoRow key={key} label={key} value={value.replace(/\s+/g, " ")} />
          ))
        )}
      </Panel>
    </Box>
  );
}
