/**
 * Audio transcoding through an ffmpeg child process
 *
 * Input goes to ffmpeg's stdin, the transcoded file comes back on stdout, so
 * nothing touches the filesystem.
 *
 * @module codecs/ffmpeg
 */

import { spawn } from 'node:child_process'
import { TranscodeError } from '../errors'
import { logger } from '../utils/logger'

/**
 * Converts encoded audio from one container format to another
 */
export interface AudioTranscoder {
  /**
   * @param data - Encoded input
   * @param sourceExtension - Input extension with its dot, or null when unknown
   * @param targetExtension - Output extension with its dot
   */
  transcode(data: Uint8Array, sourceExtension: string | null, targetExtension: string): Promise<Uint8Array>
}

type ExecResult = Readonly<{
  code: number
  stdout: Buffer
  stderr: string
}>

const execWithInput = async (
  cmd: string,
  args: readonly string[],
  input: Uint8Array
): Promise<ExecResult> =>
  await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(cmd, [...args], { stdio: ['pipe', 'pipe', 'pipe'] })

    const outChunks: Buffer[] = []
    const errChunks: Buffer[] = []

    child.stdout.on('data', (b: Buffer) => outChunks.push(b))
    child.stderr.on('data', (b: Buffer) => errChunks.push(b))
    child.on('error', reject)
    // ffmpeg may exit before reading all of stdin
    child.stdin.on('error', (error: Error) => logger.debug(`${cmd} closed stdin early`, error))

    child.on('close', code => {
      resolve({
        code: typeof code === 'number' ? code : 1,
        stdout: Buffer.concat(outChunks),
        stderr: Buffer.concat(errChunks).toString('utf8'),
      })
    })

    child.stdin.end(input)
  })

/**
 * ffmpeg muxer names by extension
 */
const FFMPEG_FORMATS: Readonly<Record<string, string>> = {
  '.wav': 'wav',
  '.mp3': 'mp3',
  '.flac': 'flac',
  '.ogg': 'ogg',
  '.opus': 'opus',
  '.m4a': 'ipod',
}

export class FfmpegAudioTranscoder implements AudioTranscoder {
  constructor(private readonly ffmpegPath = 'ffmpeg') {}

  async transcode(
    data: Uint8Array,
    sourceExtension: string | null,
    targetExtension: string
  ): Promise<Uint8Array> {
    const outputFormat = FFMPEG_FORMATS[targetExtension]
    if (outputFormat === undefined) {
      throw new TranscodeError(`No ffmpeg output format for ${targetExtension}`, {
        targetExtension,
      })
    }

    const args = ['-hide_banner', '-loglevel', 'error', '-i', 'pipe:0', '-f', outputFormat, 'pipe:1']
    let result: ExecResult
    try {
      result = await execWithInput(this.ffmpegPath, args, data)
    } catch (error: unknown) {
      throw new TranscodeError(
        `Failed to run ${this.ffmpegPath}`,
        { sourceExtension, targetExtension },
        error instanceof Error ? error : undefined
      )
    }

    if (result.code !== 0) {
      throw new TranscodeError(
        `ffmpeg exited with code ${result.code}: ${result.stderr.trim()}`,
        { sourceExtension, targetExtension, exitCode: result.code }
      )
    }
    logger.debug(
      `Transcoded ${data.length} bytes of ${sourceExtension ?? 'unknown'} audio to ${targetExtension}`
    )
    return new Uint8Array(result.stdout)
  }
}
