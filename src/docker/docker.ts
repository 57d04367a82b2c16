import Docker from "dockerode";

import { DockerError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

export function dockerClient(): Docker {
  return new Docker();
}

export async function findContainerByName(
  docker: Docker,
  name: string,
): Promise<Docker.Container | null> {
  const containers = await docker.listContainers({ all: true });
  const match = containers.find((c) => (c.Names ?? []).includes(`/${name}`));
  if (!match) return null;
  return docker.getContainer(match.Id);
}

export async function stopContainer(
  container: Docker.Container,
  timeoutSeconds = 10,
): Promise<void> {
  try {
    await container.stop({ t: timeoutSeconds });
  } catch (err) {
    // 304: already stopped
    if (resolveDockerErrorDetails(err).statusCode === 304) return;
    throw new DockerError(`Failed to stop container: ${describeDockerError(err)}`, err);
  }
}

export async function startContainer(container: Docker.Container): Promise<void> {
  try {
    await container.start();
  } catch (err) {
    // 304: already running
    if (resolveDockerErrorDetails(err).statusCode === 304) return;
    throw createStartContainerUserFacingError(err);
  }
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const DOCKER_UNAVAILABLE_HINT =
  "Start the Docker daemon and retry, or set agent.runner to local to bypass Docker.";

const DOCKER_RUN_HINT = "Check that the agent container exists and is configured, then retry.";

export type DockerErrorDetails = {
  message: string;
  code?: string;
  reason?: string;
  statusCode?: number;
};

export function describeDockerError(err: unknown): string {
  const details = resolveDockerErrorDetails(err);
  return details.reason || details.message || "Unknown docker error.";
}

export function createMissingContainerError(name: string): DockerError {
  return new DockerError(`No such container: ${name}`);
}

function createStartContainerUserFacingError(err: unknown): UserFacingError {
  const details = resolveDockerErrorDetails(err);
  const dockerError = new DockerError(`Failed to start container: ${describeDockerError(err)}`, err);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.docker,
    title: "Docker container start failed.",
    message: "Unable to start the agent container.",
    hint: isDockerUnavailableError(details) ? DOCKER_UNAVAILABLE_HINT : DOCKER_RUN_HINT,
    cause: dockerError,
  });
}

export function resolveDockerErrorDetails(err: unknown): DockerErrorDetails {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }

  const code = readStringField(err, "code");
  const reason = readStringField(err, "reason");
  const statusCode = "statusCode" in err && typeof err.statusCode === "number" ? err.statusCode : undefined;

  return { message: err.message, code, reason, statusCode };
}

export function isDockerUnavailableError(details: DockerErrorDetails): boolean {
  if (details.code === "ENOENT" || details.code === "ECONNREFUSED") {
    return true;
  }

  const text = `${details.message}\n${details.reason ?? ""}`.toLowerCase();
  return (
    text.includes("cannot connect to the docker daemon") ||
    text.includes("is the docker daemon running") ||
    text.includes("error during connect") ||
    text.includes("docker.sock") ||
    text.includes("connect econnrefused") ||
    text.includes("connect enoent")
  );
}

function readStringField(err: Error, field: "code" | "reason"): string | undefined {
  if (!(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}
