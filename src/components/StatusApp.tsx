import React, { useEffect } from "react";
import { Box, Text, useApp } from "ink";
import Spinner from "ink-spinner";
import { Header, Status, ConnectionStatus } from "./index.ts";
import { useDeviceStatus } from "../hooks/useDeviceStatus.ts";
import type { StatusOptions } from "../cli/types.ts";

export interface StatusAppProps {
  options: StatusOptions;
}

export const StatusApp: React.FC<StatusAppProps> = ({ options }) => {
  const { exit } = useApp();
  const { loading, error, deviceStatus, connectionSteps } =
    useDeviceStatus(options);

  useEffect(() => {
    if (!loading) {
      process.exitCode = error ? error.exitCode : 0;
      // Let the final frame render before unmounting
      const timer = setTimeout(() => exit(), 100);
      return () => clearTimeout(timer);
    }
  }, [loading, error, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {loading && (
        <Box flexDirection="column">
          <Box>
            <Text color="cyan">
              <Spinner type="dots" />
            </Text>
            <Text color="cyan" bold>
              {" "}
              Contacting PaperS3 device...
            </Text>
          </Box>
          <ConnectionStatus steps={connectionSteps} />
        </Box>
      )}

      {error && (
        <Box flexDirection="column">
          <ConnectionStatus steps={connectionSteps} />
          <Box marginTop={1}>
            <Text color="red" bold>
              ✗ Error: {error.message}
            </Text>
          </Box>
          <Box marginTop={1}>
            <Text color="dim">
              Make sure the device is powered on and on the same network.
            </Text>
          </Box>
        </Box>
      )}

      {!loading && !error && (
        <Status status={deviceStatus} verbose={options.verbose} />
      )}
    </Box>
  );
};
