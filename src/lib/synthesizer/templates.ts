/**
 * Per-type monitor prototypes. Frozen; every instantiation is a structuredClone.
 */

import type { HttpMonitor, IcmpMonitor, TcpMonitor } from "../../types/data-model.js";

function freezeChildren(value: unknown): void {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      freezeChildren(child);
    }
    Object.freeze(value);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  freezeChildren(value);
  return Object.freeze(value);
}

export const HTTP_TEMPLATE = deepFreeze<HttpMonitor>({
  name: "",
  pulse_check: {
    type: "http",
    interval: "5s",
    timeout: "3s",
    max_failures: 3,
    config: {
      retries: 2,
      method: "GET",
      url: "",
    },
  },
  codes: {
    red: {
      dispatch: true,
      notify: "pagerduty",
      config: { url: "pager" },
    },
    yellow: {
      dispatch: true,
      notify: "log",
      config: { file: "test-code.txt" },
    },
  },
});

export const TCP_TEMPLATE = deepFreeze<TcpMonitor>({
  name: "",
  pulse_check: {
    type: "tcp",
    interval: "10s",
    timeout: "5s",
    max_failures: 3,
    config: {
      retries: 3,
      host: "",
      port: 0,
    },
  },
  codes: {
    red: {
      dispatch: true,
      notify: "pagerduty",
      config: { url: "pager" },
    },
    yellow: {
      dispatch: true,
      notify: "log",
      config: { file: "test-code.txt" },
    },
  },
});

export const ICMP_TEMPLATE = deepFreeze<IcmpMonitor>({
  name: "",
  pulse_check: {
    type: "icmp",
    interval: "15s",
    timeout: "5s",
    max_failures: 3,
    config: {
      retries: 3,
      host: "",
    },
  },
  codes: {
    red: {
      dispatch: true,
      notify: "log",
      config: { file: "critical_alerts.log" },
    },
    yellow: {
      dispatch: true,
      notify: "log",
      config: { file: "warning_alerts.log" },
    },
  },
  metadata: { port_hint: 0 },
});
