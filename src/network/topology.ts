// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { SessionError } from "../common/errors.js";
import type { Clock, Device, Session, Topology, TopologyLinks } from "../common/types.js";
import { emit, noopSink, type SessionEventSink } from "../session/events.js";

/**
 * First match wins. The star and bus predicates overlap (N<=3, H=1 also
 * satisfies N<=5, H<=2), so the order below is part of the contract.
 */
export function selectTopology(deviceCount: number, hostCount: number): Topology {
  if (hostCount === 0) {
    throw new SessionError("invalid_topology_input", {
      stage: "topology",
      details: { deviceCount, hostCount }
    });
  }
  if (deviceCount <= 3 && hostCount === 1) return "star";
  if (deviceCount <= 5 && hostCount <= 2) return "bus";
  if (hostCount >= 2) return "mesh";
  return "hybrid";
}

function link(links: TopologyLinks, a: string, b: string): void {
  if (a === b) return;
  if (!links[a].includes(b)) links[a].push(b);
  if (!links[b].includes(a)) links[b].push(a);
}

/** Builds the session-owned adjacency list for a topology, in registry order. */
export function buildTopologyLinks(devices: readonly Device[], topology: Topology): TopologyLinks {
  const links: TopologyLinks = {};
  for (const device of devices) links[device.deviceId] = [];

  const hosts = devices.filter((d) => d.role === "host");
  const others = devices.filter((d) => d.role !== "host");

  switch (topology) {
    case "star": {
      const hub = hosts[0];
      if (!hub) break;
      for (const device of others) link(links, hub.deviceId, device.deviceId);
      break;
    }
    case "bus":
      for (let i = 1; i < devices.length; i++) {
        link(links, devices[i - 1].deviceId, devices[i].deviceId);
      }
      break;
    case "mesh":
      for (let i = 0; i < devices.length; i++) {
        for (let j = i + 1; j < devices.length; j++) {
          link(links, devices[i].deviceId, devices[j].deviceId);
        }
      }
      break;
    case "hybrid":
      for (let i = 0; i < hosts.length; i++) {
        for (let j = i + 1; j < hosts.length; j++) {
          link(links, hosts[i].deviceId, hosts[j].deviceId);
        }
      }
      if (hosts.length === 0) break;
      others.forEach((device, index) => {
        link(links, hosts[index % hosts.length].deviceId, device.deviceId);
      });
      break;
  }
  return links;
}

export class TopologySelector {
  constructor(
    private readonly sink: SessionEventSink = noopSink,
    private readonly clock: Clock = Date.now
  ) {}

  select(session: Session): Topology {
    const deviceCount = session.devices.length;
    const hostCount = session.devices.filter((d) => d.role === "host").length;
    let topology: Topology;
    try {
      topology = selectTopology(deviceCount, hostCount);
    } catch (err) {
      if (err instanceof SessionError) {
        throw new SessionError(err.code, { sessionId: session.sessionId, stage: "topology", details: err.details });
      }
      throw err;
    }
    emit(this.sink, { type: "topology_selected", sessionId: session.sessionId, topology, deviceCount, hostCount }, this.clock);
    return topology;
  }

  /** Selects the topology and records it with its links on the session. */
  apply(session: Session): Topology {
    const topology = this.select(session);
    session.topology = topology;
    session.links = buildTopologyLinks(session.devices, topology);
    return topology;
  }
}
