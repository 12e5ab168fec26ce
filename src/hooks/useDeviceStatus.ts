import { useState, useEffect, useCallback, useRef } from "react";
import { DeviceClient } from "../lib/core/device-client.ts";
import { resolveEndpoint } from "../lib/core/target-resolver.ts";
import { describeError, exitCodeFor } from "../lib/utils/errors.ts";
import { logger, LogEventType } from "../lib/utils/logger.ts";
import type { DeviceStatus } from "../lib/protocol/interfaces/index.ts";
import type { ConnectionStep } from "../components/index.ts";
import { failActiveStep, updateStepStatus } from "../utils/app-utils.ts";
import type { StatusOptions } from "../cli/types.ts";

export interface StatusFailure {
  message: string;
  exitCode: number;
}

export function useDeviceStatus(options: StatusOptions) {
  const [loading, setLoading] = useState<boolean>(true);
  const [error, setError] = useState<StatusFailure | null>(null);
  const [deviceStatus, setDeviceStatus] = useState<DeviceStatus | null>(null);
  const [connectionSteps, setConnectionSteps] = useState<ConnectionStep[]>([
    { id: "resolve", label: "Resolving device address", status: "active" },
    { id: "query", label: "Querying device status", status: "pending" },
  ]);
  const hasQueried = useRef(false);

  useEffect(() => {
    const unsubscribe = logger.onLog((entry) => {
      switch (entry.eventType) {
        case LogEventType.ENDPOINT_RESOLVED:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "resolve", "complete", "query"),
          );
          break;

        case LogEventType.STATUS_RECEIVED:
          setConnectionSteps((prev) =>
            updateStepStatus(prev, "query", "complete"),
          );
          break;
      }
    });

    return unsubscribe;
  }, []);

  const queryStatus = useCallback(async () => {
    try {
      const client = new DeviceClient(resolveEndpoint(options.ip));
      setDeviceStatus(await client.getStatus());
    } catch (err) {
      setError({ message: describeError(err), exitCode: exitCodeFor(err) });
      setConnectionSteps((prev) => failActiveStep(prev, "Failed"));
    } finally {
      setLoading(false);
    }
  }, [options.ip]);

  useEffect(() => {
    if (!hasQueried.current) {
      hasQueried.current = true;
      void queryStatus();
    }
  }, [queryStatus]);

  return {
    loading,
    error,
    deviceStatus,
    connectionSteps,
  };
}
