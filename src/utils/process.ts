/**
 * Child process helper shared by the test runner and the git fix applier.
 *
 * Wraps `child_process.spawn`: collects stdout and stderr, optionally pipes
 * `input` to stdin and kills the process after `timeoutMs`. A process that
 * survives SIGTERM gets SIGKILL once `killGraceMs` has passed.
 */

import { spawn } from 'node:child_process'

export interface RunProcessOptions {
  cwd: string
  /** Written to stdin, which is then closed */
  input?: string
  /** SIGTERM after this many milliseconds */
  timeoutMs?: number
  /** SIGKILL this long after SIGTERM (default KILL_GRACE_MS) */
  killGraceMs?: number
}

export const KILL_GRACE_MS = 2_000

export interface ProcessResult {
  /** Exit code; null when the process was terminated by a signal */
  code: number | null
  stdout: string
  stderr: string
  timedOut: boolean
}

/**
 * Run a command to completion.
 *
 * Resolves once the process closes, whatever its exit code. After a timeout
 * it resolves as soon as the process has exited, even while a grandchild
 * still holds the output pipes. Rejects only when the process could not be
 * started.
 */
export async function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions,
): Promise<ProcessResult> {
  return new Promise<ProcessResult>((res, rej) => {
    let stdout = ''
    let stderr = ''
    let timedOut = false
    let settled = false

    const proc = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
    })

    if (proc.stdout !== null) {
      proc.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8')
      })
    }
    if (proc.stderr !== null) {
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf-8')
      })
    }

    let killTimer: ReturnType<typeof setTimeout> | undefined
    let exitCode: number | null | undefined

    const finish = (code: number | null): void => {
      clearTimeout(timer)
      clearTimeout(killTimer)
      if (settled) return
      settled = true
      res({ code, stdout, stderr, timedOut })
    }

    // The pipes can outlive the process when a grandchild inherited them
    const abandonPipes = (code: number | null): void => {
      proc.stdout?.destroy()
      proc.stderr?.destroy()
      finish(code)
    }

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true
            if (exitCode !== undefined) {
              abandonPipes(exitCode)
              return
            }
            proc.kill('SIGTERM')
            killTimer = setTimeout(() => {
              if (exitCode !== undefined) {
                abandonPipes(exitCode)
              } else {
                proc.kill('SIGKILL')
              }
            }, options.killGraceMs ?? KILL_GRACE_MS)
          }, options.timeoutMs)
        : undefined

    proc.on('error', (err: Error) => {
      clearTimeout(timer)
      clearTimeout(killTimer)
      if (settled) return
      settled = true
      rej(err)
    })

    proc.on('exit', (code: number | null) => {
      exitCode = code
      if (timedOut) abandonPipes(code)
    })

    proc.on('close', (code: number | null) => {
      finish(code)
    })

    if (options.input !== undefined && proc.stdin !== null) {
      // EPIPE when the process exits before reading all input
      proc.stdin.on('error', (err: Error) => {
        stderr += `\n[stdin] ${err.message}`
      })
      proc.stdin.end(options.input)
    }
  })
}
