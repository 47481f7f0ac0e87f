/**
 * Docker Manager - Container lifecycle and command execution
 *
 * The OpenLane toolchain runs inside a long-lived container; every pipeline
 * stage is a command executed there.
 */

import { exec, spawn, type ChildProcess } from "child_process";
import { promisify } from "util";

const execAsync = promisify(exec);

// Configuration
const DEFAULT_CONTAINER_NAME = process.env.DOCKER_CONTAINER_NAME || "flow-autotuner";
const DOCKER_COMPOSE_PATH = process.env.FLOW_COMPOSE_FILE || "./docker/docker-compose.yml";

// Timeout settings
const COMMAND_TIMEOUT = 120_000; // 2 minutes for regular commands
const LONG_COMMAND_TIMEOUT = 3_600_000; // 1 hour for a flow stage
const MAX_BUFFER = 10 * 1024 * 1024; // 10MB

export interface DockerExecResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ContainerStatus {
  running: boolean;
  id?: string;
  image?: string;
  status?: string;
}

export interface LongExecOptions {
  workdir?: string;
  timeout?: number;
  env?: Record<string, string>;
  onOutput?: (data: string) => void;
}

/**
 * The part of the manager a stage runner needs
 */
export interface ContainerExecutor {
  ensureRunning(): Promise<boolean>;
  execLong(command: string, options?: LongExecOptions): Promise<DockerExecResult>;
}

/**
 * Shape of the error thrown by a failed promisified exec
 */
interface ExecFailure {
  message?: string;
  stdout?: string | Buffer;
  stderr?: string | Buffer;
  code?: number | string;
}

function toExecFailure(error: unknown): ExecFailure {
  if (!error || typeof error !== "object") {
    return { message: String(error) };
  }

  const failure: ExecFailure = {};
  if ("message" in error && typeof error.message === "string") {
    failure.message = error.message;
  }
  if ("stdout" in error && (typeof error.stdout === "string" || Buffer.isBuffer(error.stdout))) {
    failure.stdout = error.stdout;
  }
  if ("stderr" in error && (typeof error.stderr === "string" || Buffer.isBuffer(error.stderr))) {
    failure.stderr = error.stderr;
  }
  if ("code" in error && (typeof error.code === "number" || typeof error.code === "string")) {
    failure.code = error.code;
  }
  return failure;
}

function exitCodeOf(failure: ExecFailure): number {
  return typeof failure.code === "number" ? failure.code : 1;
}

/**
 * DockerManager class - Singleton for managing the flow container
 */
export class DockerManager implements ContainerExecutor {
  private static instance: DockerManager;
  private containerName: string;

  private constructor(containerName = DEFAULT_CONTAINER_NAME) {
    this.containerName = containerName;
  }

  /**
   * Get the singleton instance
   */
  static getInstance(): DockerManager {
    if (!DockerManager.instance) {
      DockerManager.instance = new DockerManager();
    }
    return DockerManager.instance;
  }

  getContainerName(): string {
    return this.containerName;
  }

  /**
   * Check if Docker is available on the system
   */
  async isDockerAvailable(): Promise<boolean> {
    try {
      await execAsync("docker --version", { timeout: 5000 });
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Get container status
   */
  async getContainerStatus(): Promise<ContainerStatus> {
    try {
      // Use double quotes for Windows compatibility
      const { stdout } = await execAsync(
        `docker inspect --format "{{.State.Running}},{{.Id}},{{.Config.Image}},{{.State.Status}}" ${this.containerName}`,
        { timeout: 10000 }
      );

      const parts = stdout.trim().split(",");
      return {
        running: parts[0] === "true",
        id: parts[1]?.substring(0, 12),
        image: parts[2],
        status: parts[3],
      };
    } catch {
      return { running: false };
    }
  }

  async isContainerRunning(): Promise<boolean> {
    const status = await this.getContainerStatus();
    return status.running;
  }

  /**
   * Start the container using docker-compose
   */
  async startContainer(): Promise<DockerExecResult> {
    const result = await this.runCommand(
      `docker-compose -f ${DOCKER_COMPOSE_PATH} up -d`,
      COMMAND_TIMEOUT
    );
    if (result.success) {
      await this.waitForContainer(30000);
    }
    return result;
  }

  /**
   * Poll until the container reports running
   */
  async waitForContainer(timeoutMs = 30000): Promise<boolean> {
    const startTime = Date.now();

    while (Date.now() - startTime < timeoutMs) {
      if (await this.isContainerRunning()) {
        return true;
      }
      await new Promise((resolve) => setTimeout(resolve, 1000));
    }

    return false;
  }

  /**
   * Execute a long-running command (a flow stage), streaming its output.
   * Rejects when the deadline passes; the child is killed first.
   */
  async execLong(command: string, options: LongExecOptions = {}): Promise<DockerExecResult> {
    const timeout = options.timeout || LONG_COMMAND_TIMEOUT;
    const workdir = options.workdir || "/workspace";

    const envArgs: string[] = [];
    for (const [key, value] of Object.entries(options.env ?? {})) {
      envArgs.push("-e", `${key}=${value}`);
    }

    return new Promise((resolve, reject) => {
      let stdout = "";
      let stderr = "";

      const child: ChildProcess = spawn(
        "docker",
        ["exec", "-w", workdir, ...envArgs, this.containerName, "/bin/bash", "-c", command],
        { stdio: ["ignore", "pipe", "pipe"] }
      );

      const timeoutHandle = setTimeout(() => {
        child.kill("SIGKILL");
        reject(new Error(`Command timed out after ${timeout}ms`));
      }, timeout);

      child.stdout?.on("data", (data: Buffer) => {
        const text = data.toString();
        stdout += text;
        options.onOutput?.(text);
      });

      child.stderr?.on("data", (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        options.onOutput?.(text);
      });

      child.on("close", (code) => {
        clearTimeout(timeoutHandle);
        resolve({
          success: code === 0,
          stdout,
          stderr,
          exitCode: code ?? 0,
        });
      });

      child.on("error", (error) => {
        clearTimeout(timeoutHandle);
        reject(error);
      });
    });
  }

  /**
   * Run a shell command on the host
   */
  private async runCommand(command: string, timeout: number): Promise<DockerExecResult> {
    try {
      const { stdout, stderr } = await execAsync(command, {
        timeout,
        maxBuffer: MAX_BUFFER,
        encoding: "utf8",
      });

      return { success: true, stdout, stderr, exitCode: 0 };
    } catch (error) {
      const failure = toExecFailure(error);
      return {
        success: false,
        stdout: failure.stdout?.toString() || "",
        stderr: failure.stderr?.toString() || failure.message || String(error),
        exitCode: exitCodeOf(failure),
      };
    }
  }

  /**
   * Ensure container is running, start if needed
   */
  async ensureRunning(): Promise<boolean> {
    if (await this.isContainerRunning()) {
      return true;
    }

    console.error("[docker] Container not running, starting...");
    const result = await this.startContainer();
    if (!result.success) {
      console.error("[docker] Failed to start container:", result.stderr);
      return false;
    }

    return this.waitForContainer();
  }
}

// Export singleton instance
export const dockerManager = DockerManager.getInstance();
