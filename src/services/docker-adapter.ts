/**
 * Docker probe adapter.
 *
 * Lists running containers, reads their healthcheck status and fetches recent
 * logs through the Docker Engine API (dockerode).
 */

import Docker from 'dockerode';
import type { ProbeAdapter, ProbeResult, ProbeStatus } from '../types.js';
import { AdapterListError, AdapterNotFoundError, AdapterProbeError, errorMessage } from '../errors.js';

// ── Docker API surface (stubbed in tests via dependency injection) ─────────────

export interface ContainerDetails {
  name:    string;
  labels:  Record<string, string>;
  /** `State.Health.Status`; undefined when no healthcheck is defined */
  health?: string;
}

export interface DockerApi {
  listContainerNames(): Promise<string[]>;
  inspect(id: string): Promise<ContainerDetails>;
  logs(id: string, tail: number): Promise<Buffer>;
}

export function fromDockerode(docker: Docker): DockerApi {
  return {
    async listContainerNames() {
      const containers = await docker.listContainers({ all: false });
      return containers
        .map((c) => (c.Names[0] ?? c.Id).replace(/^\//, ''));
    },
    async inspect(id) {
      const info = await docker.getContainer(id).inspect();
      return {
        name:   info.Name.replace(/^\//, ''),
        labels: info.Config.Labels ?? {},
        health: info.State.Health?.Status,
      };
    },
    async logs(id, tail) {
      return docker.getContainer(id).logs({ stdout: true, stderr: true, tail, follow: false });
    },
  };
}

// ── Helpers ───────────────────────────────────────────────────────────────────

const COMPOSE_PROJECT_LABEL = 'com.docker.compose.project';

/**
 * Compose project label, else the prefix before the first `-`
 * (compose names containers `project-service-1`), else `unknown`.
 */
export function projectName(name: string, labels: Record<string, string>): string {
  const label = labels[COMPOSE_PROJECT_LABEL];
  if (label) return label;
  const match = /^([^-]+)-/.exec(name);
  return match ? match[1] : 'unknown';
}

export function toProbeStatus(health: string | undefined): ProbeStatus {
  switch (health) {
    case 'healthy':
    case 'unhealthy':
    case 'starting':
      return health;
    default:
      return 'no_health_info';
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'statusCode' in err && err.statusCode === 404;
}

/**
 * Decode a non-TTY log buffer. Docker prefixes every chunk with an 8-byte
 * header: stream type, three zero bytes, then the payload size (uint32 BE).
 * Buffers that don't follow that framing (TTY containers) are returned as-is.
 */
export function demuxLogs(buf: Buffer): string {
  const chunks: Buffer[] = [];
  let offset = 0;
  while (offset < buf.length) {
    if (offset + 8 > buf.length) return buf.toString('utf8');
    const stream = buf[offset];
    if (stream > 2 || buf[offset + 1] !== 0 || buf[offset + 2] !== 0 || buf[offset + 3] !== 0) {
      return buf.toString('utf8');
    }
    const size = buf.readUInt32BE(offset + 4);
    const end  = offset + 8 + size;
    if (end > buf.length) return buf.toString('utf8');
    chunks.push(buf.subarray(offset + 8, end));
    offset = end;
  }
  return Buffer.concat(chunks).toString('utf8');
}

// ── Adapter ───────────────────────────────────────────────────────────────────

export class DockerProbeAdapter implements ProbeAdapter {
  constructor(private readonly api: DockerApi) {}

  static connect(socketPath?: string): DockerProbeAdapter {
    const docker = socketPath ? new Docker({ socketPath }) : new Docker();
    return new DockerProbeAdapter(fromDockerode(docker));
  }

  async listEntityIds(): Promise<string[]> {
    try {
      return await this.api.listContainerNames();
    } catch (err) {
      throw new AdapterListError(`Could not list containers: ${errorMessage(err)}`, { cause: err });
    }
  }

  async probe(entityId: string): Promise<ProbeResult> {
    let details: ContainerDetails;
    try {
      details = await this.api.inspect(entityId);
    } catch (err) {
      if (isNotFound(err)) throw new AdapterNotFoundError(entityId, { cause: err });
      throw new AdapterProbeError(entityId, `Could not inspect ${entityId}: ${errorMessage(err)}`, { cause: err });
    }
    return {
      status: toProbeStatus(details.health),
      group:  projectName(details.name || entityId, details.labels),
    };
  }

  async recentDiagnostics(entityId: string, maxLines: number): Promise<string> {
    try {
      const raw = await this.api.logs(entityId, maxLines);
      return demuxLogs(raw);
    } catch (err) {
      if (isNotFound(err)) return 'Container not found - may have been removed';
      return `Could not retrieve logs: ${errorMessage(err)}`;
    }
  }
}
