import { Box, Newline, Text } from "ink";
import type React from "react";
import type { DeviceStatus } from "../lib/protocol/interfaces/index.ts";
import { formatBytes, signalQuality } from "../utils/app-utils.ts";

interface StatusProps {
  status: DeviceStatus | null;
  verbose: boolean;
}

const Row: React.FC<{ label: string; children: React.ReactNode }> = ({
  label,
  children,
}) => (
  <Box marginBottom={0.5}>
    <Box width={12}>
      <Text color="gray">{label}</Text>
    </Box>
    {children}
  </Box>
);

const SignalBar: React.FC<{ rssi: number }> = ({ rssi }) => {
  const quality = signalQuality(rssi);
  const barLength = 20;
  const filledLength = Math.round((quality / 100) * barLength);
  const filled = "█".repeat(filledLength);
  const empty = "░".repeat(barLength - filledLength);

  const getBarColor = () => {
    if (quality >= 60) return "green";
    if (quality >= 30) return "yellow";
    return "red";
  };

  return (
    <Box>
      <Text color="dim">[</Text>
      <Text color={getBarColor()}>{filled}</Text>
      <Text color="dim">{empty}]</Text>
      <Text color="dim"> {quality}%</Text>
    </Box>
  );
};

export const Status: React.FC<StatusProps> = ({ status, verbose }) => {
  if (!status) {
    return (
      <Box>
        <Text color="yellow">⚠ No device status received</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Box>
        <Text bold color="green">
          Device Status
        </Text>
      </Box>

      <Box marginTop={1} paddingLeft={2} flexDirection="column">
        <Box>
          <Text color="cyan" bold>
            Display
          </Text>
        </Box>

        <Box paddingLeft={2} flexDirection="column">
          <Row label="Mode:">
            <Text color="white">{status.mode}</Text>
          </Row>
          <Row label="Screen:">
            <Text color="white">
              {status.screenWidth}x{status.screenHeight}
            </Text>
            <Text color="dim"> pixels</Text>
          </Row>
          {status.rotation !== undefined && (
            <Row label="Rotation:">
              <Text>{status.rotation}</Text>
            </Row>
          )}
          {status.retain !== undefined && (
            <Row label="Retain:">
              <Text color={status.retain ? "green" : "gray"}>
                {status.retain ? "on" : "off"}
              </Text>
            </Row>
          )}
        </Box>

        <Box marginTop={1}>
          <Text color="cyan" bold>
            Memory
          </Text>
        </Box>

        <Box paddingLeft={2} flexDirection="column">
          <Row label="Heap free:">
            <Text color="green">{formatBytes(status.heapFree)}</Text>
            {status.heapMin !== undefined && (
              <Text color="dim"> (min {formatBytes(status.heapMin)})</Text>
            )}
          </Row>
          {status.spiramFree !== undefined && (
            <Row label="PSRAM free:">
              <Text color="green">{formatBytes(status.spiramFree)}</Text>
            </Row>
          )}
        </Box>

        {status.wifiRssi !== undefined && (
          <>
            <Box marginTop={1}>
              <Text color="cyan" bold>
                Network
              </Text>
            </Box>
            <Box paddingLeft={2} flexDirection="column">
              <Row label="Wi-Fi:">
                <Text>{status.wifiRssi} dBm </Text>
                <SignalBar rssi={status.wifiRssi} />
              </Row>
            </Box>
          </>
        )}

        {status.mqtt && (
          <>
            <Box marginTop={1}>
              <Text color="cyan" bold>
                MQTT
              </Text>
            </Box>
            <Box paddingLeft={2} flexDirection="column">
              <Row label="Connected:">
                <Text color={status.mqtt.connected ? "green" : "yellow"}>
                  {status.mqtt.connected ? "yes" : "no"}
                </Text>
              </Row>
              {status.mqtt.broker && (
                <Row label="Broker:">
                  <Text>{status.mqtt.broker}</Text>
                </Row>
              )}
              {status.mqtt.topic && (
                <Row label="Topic:">
                  <Text>{status.mqtt.topic}</Text>
                </Row>
              )}
            </Box>
          </>
        )}

        {verbose && (
          <Box marginTop={1} paddingLeft={2}>
            <Text color="dim">Raw status:</Text>
            <Newline />
            <Text color="gray">{JSON.stringify(status, null, 2)}</Text>
          </Box>
        )}
      </Box>
    </Box>
  );
};
