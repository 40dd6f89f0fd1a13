import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { PrintStatus } from "../hooks/usePrint.ts";

interface PrintProgressProps {
  status: PrintStatus;
  message?: string;
  progress?: number;
}

const ProgressBar: React.FC<{ progress: number }> = ({ progress }) => {
  const percentage = Math.round(progress);
  const barLength = 30;
  const filledLength = Math.round((progress / 100) * barLength);
  const filled = "█".repeat(filledLength);
  const empty = "░".repeat(barLength - filledLength);

  return (
    <Box marginTop={1}>
      <Text color="dim">[</Text>
      <Text color={percentage < 100 ? "cyan" : "green"}>{filled + empty}</Text>
      <Text color="dim">] {percentage}%</Text>
    </Box>
  );
};

export const PrintProgress: React.FC<PrintProgressProps> = ({
  status,
  message,
  progress,
}) => {
  const getStatusColor = () => {
    switch (status) {
      case "connecting":
        return "cyan";
      case "printing":
        return "blue";
      case "success":
        return "green";
      case "error":
        return "red";
    }
  };

  const statusIcon =
    status === "success" ? "✓" : status === "error" ? "✗" : null;

  return (
    <Box flexDirection="column" paddingY={1}>
      <Box>
        {!statusIcon && (
          <Text color={getStatusColor()}>
            <Spinner type="dots" />
          </Text>
        )}
        {statusIcon && <Text color={getStatusColor()}>{statusIcon}</Text>}
        <Box marginLeft={1}>
          <Text color={getStatusColor()} bold>
            {message || status.toUpperCase()}
          </Text>
        </Box>
      </Box>
      {progress !== undefined && status === "printing" && (
        <ProgressBar progress={progress} />
      )}
    </Box>
  );
};
