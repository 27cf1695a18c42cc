import type Docker from "dockerode";

import {
  type ContainerSpec,
  type ContainerWaitResult,
  createContainer as createDockerContainer,
  dockerClient,
  findContainerByName as findDockerContainerByName,
  imageExists as dockerImageExists,
  killContainer,
  removeContainer as removeDockerContainer,
  startContainer as startDockerContainer,
  waitContainer,
} from "./docker.js";
import { attachOutputCapture, type StreamLineHandler } from "./streams.js";

export type RunContainerOptions = {
  spec: ContainerSpec;
  timeoutMs?: number;
  onStderrLine?: StreamLineHandler;
};

export type RunContainerResult =
  | (ContainerWaitResult & { timedOut: false; stdout: string; containerId: string })
  | { timedOut: true; stdout: string; containerId: string };

export class DockerManager {
  private readonly docker: Docker;

  constructor(opts: { docker?: Docker } = {}) {
    this.docker = opts.docker ?? dockerClient();
  }

  async imageExists(image: string): Promise<boolean> {
    return dockerImageExists(this.docker, image);
  }

  async findContainerByName(name: string): Promise<Docker.Container | null> {
    return findDockerContainerByName(this.docker, name);
  }

  async removeContainer(container: Docker.Container): Promise<void> {
    await removeDockerContainer(container);
  }

  /**
   * Creates, starts and waits for one container, capturing its stdout.
   * The container is always removed afterwards; on timeout it is killed first.
   */
  async runContainer(opts: RunContainerOptions): Promise<RunContainerResult> {
    const container = await createDockerContainer(this.docker, opts.spec);
    const containerId = container.id;

    try {
      const capture = await attachOutputCapture(container, opts.onStderrLine ?? (() => undefined));
      try {
        await startDockerContainer(container);
        const exit = waitContainer(container);
        const waited = await waitWithTimeout(exit, opts.timeoutMs);

        if (waited === null) {
          await killContainer(container);
          await exit;
          return { timedOut: true, stdout: capture.stdout(), containerId };
        }

        await capture.completed;
        return { ...waited, timedOut: false, stdout: capture.stdout(), containerId };
      } finally {
        capture.detach();
      }
    } finally {
      await removeDockerContainer(container);
    }
  }
}

async function waitWithTimeout<T>(pending: Promise<T>, timeoutMs?: number): Promise<T | null> {
  if (timeoutMs === undefined) {
    return pending;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
