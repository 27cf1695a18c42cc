import { PassThrough } from "node:stream";

import type Docker from "dockerode";

export type StreamLineHandler = (line: string) => void;

export type OutputCaptureHandle = {
  stdout: () => string;
  detach: () => void;
  completed: Promise<void>;
};

type DemuxModem = {
  demuxStream: (
    stream: NodeJS.ReadableStream,
    stdout: NodeJS.WritableStream,
    stderr: NodeJS.WritableStream,
  ) => void;
};

/**
 * Attaches to a created (not yet started) container and captures its stdout
 * text verbatim. Stderr is forwarded line by line to `onStderrLine`.
 */
export async function attachOutputCapture(
  container: Docker.Container,
  onStderrLine: StreamLineHandler,
): Promise<OutputCaptureHandle> {
  const raw = await container.attach({ stream: true, stdout: true, stderr: true });
  return demuxOutput(raw, container, onStderrLine);
}

function demuxOutput(
  raw: NodeJS.ReadableStream,
  container: Docker.Container,
  onStderrLine: StreamLineHandler,
): OutputCaptureHandle {
  const stdout = new PassThrough();
  const stderr = new PassThrough();

  const modem = resolveDemuxModem(container);
  if (modem) {
    modem.demuxStream(raw, stdout, stderr);
    const close = (): void => {
      stdout.end();
      stderr.end();
    };
    raw.on("end", close);
    raw.on("close", close);
  } else {
    // Containers started with a TTY have a single, unmultiplexed stream.
    raw.pipe(stdout);
    stderr.end();
  }

  const chunks: Buffer[] = [];
  const onStdout = (chunk: Buffer | string): void => {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  };
  stdout.on("data", onStdout);
  const detachStderr = pipeLines(stderr, onStderrLine);

  const completed = Promise.all([waitForStreamEnd(stdout), waitForStreamEnd(stderr)]).then(
    () => undefined,
  );

  return {
    stdout: () => Buffer.concat(chunks).toString("utf8"),
    detach: () => {
      stdout.off("data", onStdout);
      detachStderr();
      stdout.destroy();
      stderr.destroy();
    },
    completed,
  };
}

function resolveDemuxModem(container: Docker.Container): DemuxModem | null {
  const modem: unknown = container.modem;
  return isDemuxModem(modem) ? modem : null;
}

function isDemuxModem(value: unknown): value is DemuxModem {
  return (
    typeof value === "object" &&
    value !== null &&
    "demuxStream" in value &&
    typeof value.demuxStream === "function"
  );
}

function pipeLines(stream: PassThrough, onLine: StreamLineHandler): () => void {
  let buf = "";
  const flush = (): void => {
    const trimmed = buf.trimEnd();
    buf = "";
    if (trimmed.length > 0) onLine(trimmed);
  };
  const onData = (chunk: Buffer | string): void => {
    buf += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    let idx: number;
    while ((idx = buf.indexOf("\n")) >= 0) {
      const line = buf.slice(0, idx).trimEnd();
      buf = buf.slice(idx + 1);
      if (line.length > 0) onLine(line);
    }
  };

  stream.on("data", onData);
  stream.on("end", flush);

  return () => {
    stream.off("data", onData);
    stream.off("end", flush);
  };
}

function waitForStreamEnd(stream: PassThrough): Promise<void> {
  return new Promise((resolve) => {
    const cleanup = (): void => {
      stream.off("end", onDone);
      stream.off("close", onDone);
      stream.off("error", onDone);
    };

    const onDone = (): void => {
      cleanup();
      resolve();
    };

    stream.on("end", onDone);
    stream.on("close", onDone);
    stream.on("error", onDone);
  });
}
