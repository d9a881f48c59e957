import type { ChildProcess } from 'child_process';

/**
 * Terminate a child and every process in its group.
 *
 * The child must have been spawned `detached` so that it leads its own
 * process group; the shell may have forked the real command, and killing
 * only the shell would leave it running. SIGKILL follows after `graceMs`
 * unless the child has exited by then.
 */
export function terminateProcessGroup(child: ChildProcess, graceMs = 250): void {
  const pid = child.pid;
  if (pid === undefined) {
    return;
  }

  sendSignal(child, pid, 'SIGTERM');

  const escalate = setTimeout(() => {
    sendSignal(child, pid, 'SIGKILL');
  }, graceMs);
  escalate.unref();
  child.once('exit', () => clearTimeout(escalate));
}

function sendSignal(child: ChildProcess, pid: number, signal: NodeJS.Signals): void {
  if (process.platform !== 'win32') {
    try {
      process.kill(-pid, signal);
      return;
    } catch {
      // group already gone, fall back to the direct child
    }
  }
  if (child.exitCode === null && child.signalCode === null) {
    child.kill(signal);
  }
}
