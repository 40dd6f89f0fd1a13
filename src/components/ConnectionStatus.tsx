import { Box, Text } from "ink";
import type React from "react";

export interface ConnectionStep {
  id: string;
  label: string;
  status: "pending" | "active" | "complete" | "error";
  error?: string;
}

interface ConnectionStatusProps {
  steps: ConnectionStep[];
}

const STEP_STYLE: Record<ConnectionStep["status"], { icon: string; color: string }> = {
  pending: { icon: "·", color: "gray" },
  active: { icon: "›", color: "cyan" },
  complete: { icon: "✓", color: "green" },
  error: { icon: "✗", color: "red" },
};

/**
 * Checklist of connection or job steps
 */
export const ConnectionStatus: React.FC<ConnectionStatusProps> = ({
  steps,
}) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      {steps.map((step) => {
        const { icon, color } = STEP_STYLE[step.status];
        return (
          <Box key={step.id}>
            <Text color={color}>
              {icon} {step.label}
              {step.status === "active" ? "..." : ""}
            </Text>
            {step.error && <Text color="dim"> ({step.error})</Text>}
          </Box>
        );
      })}
    </Box>
  );
};
