import { Box, Text } from "ink";
import Spinner from "ink-spinner";
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

const StepMarker: React.FC<{ status: ConnectionStep["status"] }> = ({
  status,
}) => {
  switch (status) {
    case "active":
      return (
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
      );
    case "complete":
      return <Text color="green">✓</Text>;
    case "error":
      return <Text color="red">✗</Text>;
    case "pending":
      return <Text color="gray">·</Text>;
  }
};

/**
 * One line per step, in order
 */
export const ConnectionStatus: React.FC<ConnectionStatusProps> = ({
  steps,
}) => {
  return (
    <Box flexDirection="column" marginTop={1}>
      {steps.map((step) => (
        <Box key={step.id}>
          <StepMarker status={step.status} />
          <Text color={step.status === "pending" ? "gray" : "white"}>
            {" "}
            {step.label}
          </Text>
          {step.error && <Text color="dim"> ({step.error})</Text>}
        </Box>
      ))}
    </Box>
  );
};
