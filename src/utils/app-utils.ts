import type { ConnectionStep } from "../components/index.ts";

export function updateStepStatus(
  steps: ConnectionStep[],
  stepId: string,
  status: ConnectionStep["status"],
  nextStepId?: string,
): ConnectionStep[] {
  return steps.map((step): ConnectionStep => {
    if (step.id === stepId) return { ...step, status };
    if (nextStepId && step.id === nextStepId)
      return { ...step, status: "active" };
    return step;
  });
}

/**
 * Marks the first unfinished step as failed
 */
export function failActiveStep(
  steps: ConnectionStep[],
  error: string,
): ConnectionStep[] {
  const current = steps.find(
    (s) => s.status === "pending" || s.status === "active",
  );
  if (!current) return steps;

  return steps.map(
    (step): ConnectionStep =>
      step.id === current.id ? { ...step, status: "error", error } : step,
  );
}

/**
 * Wi-Fi link quality in percent from RSSI: -100 dBm and below is 0,
 * -50 dBm and above is 100
 */
export function signalQuality(rssi: number): number {
  return Math.min(100, Math.max(0, 2 * (rssi + 100)));
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const k = 1024;
  const i = Math.min(
    units.length - 1,
    Math.floor(Math.log(bytes) / Math.log(k)),
  );
  const value = bytes / k ** i;
  return `${value.toFixed(2)} ${units[i]}`;
}
