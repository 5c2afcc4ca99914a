/**
 * Transcode Analysis
 *
 * Pure functions for playback method, transcode targets, source stream
 * details and per-session bitrate estimates.
 */

import type { StreamInfo, TranscodeInfo } from '@marquee/shared';
import type { EmbySession, EmbyTranscodingInfo } from '../mediaServer/types.js';
import { compact } from '../../utils/parsing.js';

const BITRATE_UNITS: Record<string, number> = {
  bps: 1,
  kbps: 1_000,
  mbps: 1_000_000,
};

/**
 * Convert a bitrate given as bps or as a display string to bps.
 * Unparseable values count as zero.
 *
 * @example
 * toBitsPerSecond(4_000_000);   // 4000000
 * toBitsPerSecond('4000kbps');  // 4000000
 * toBitsPerSecond('fast');      // 0
 */
export function toBitsPerSecond(value: number | string | undefined): number {
  if (value === undefined) return 0;
  if (typeof value === 'number') return Number.isFinite(value) && value > 0 ? value : 0;

  const match = /^\s*(\d+(?:\.\d+)?)\s*(bps|kbps|mbps)?\s*$/i.exec(value);
  if (!match?.[1]) return 0;
  const unit = BITRATE_UNITS[(match[2] ?? 'bps').toLowerCase()] ?? 1;
  return Number(match[1]) * unit;
}

/**
 * Render a target bitrate the way it is displayed: floor(bps / 1000) + "kbps".
 * A string from the payload is already a display value and is kept verbatim.
 *
 * @example
 * formatBitrate(4_000_000);  // "4000kbps"
 * formatBitrate('4000kbps'); // "4000kbps"
 */
export function formatBitrate(value: number | string | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  return `${Math.floor(value / 1000)}kbps`;
}

/**
 * The session's transcoding block, top-level first
 */
function transcodingBlock(session: EmbySession): EmbyTranscodingInfo | undefined {
  return session.transcodingInfo ?? session.playState.transcodingInfo;
}

/**
 * Determine playback method and transcode targets.
 *
 * A session is transcoding iff it carries a non-empty TranscodingInfo block.
 * Reasons are passed through as reported; none are inferred.
 *
 * @example
 * analyzeTranscode(session);
 * // { playbackMethod: 'transcoding', videoCodec: 'h264', bitrate: '4000kbps' }
 */
export function analyzeTranscode(session: EmbySession): TranscodeInfo {
  const block = transcodingBlock(session);
  if (!block) return { playbackMethod: 'direct' };

  const { playState } = session;
  return compact<TranscodeInfo>({
    playbackMethod: 'transcoding',
    videoCodec: playState.transcodingVideoCodec ?? block.videoCodec,
    audioCodec: playState.transcodingAudioCodec ?? block.audioCodec,
    bitrate: formatBitrate(block.bitrate ?? playState.bitrate),
    reasons: block.reasons ?? playState.transcodingReasons,
    container: block.container,
    isHls: block.isHls,
    height: block.height,
  });
}

/**
 * Source stream details from the first video and first audio stream
 */
export function extractStreamInfo(session: EmbySession): StreamInfo {
  const item = session.nowPlayingItem;
  if (!item) return {};

  const video = item.mediaStreams.find((s) => s.type === 'Video');
  const audio = item.mediaStreams.find((s) => s.type === 'Audio');

  const info: StreamInfo = {};
  if (video) {
    info.video = compact({
      codec: video.codec,
      width: video.width,
      height: video.height,
      bitrate: video.bitrate,
      framerate: video.framerate,
      aspectRatio: video.aspectRatio,
    });
  }
  if (audio) {
    info.audio = compact({
      codec: audio.codec,
      channels: audio.channels,
      bitrate: audio.bitrate,
      sampleRate: audio.sampleRate,
      language: audio.language,
    });
  }
  if (item.container) info.container = item.container;
  return info;
}

export interface BitrateEstimate {
  videoBps: number;
  audioBps: number;
}

/**
 * Estimate what a session is currently streaming.
 *
 * Video and audio come from the play state, then the transcoding block, then
 * the source streams. When neither is known the overall transcode bitrate or
 * the media source bitrate stands in as the total (reported as video).
 * Sessions without any bitrate data estimate to zero.
 */
export function estimateBitrates(session: EmbySession, stream: StreamInfo): BitrateEstimate {
  const block = transcodingBlock(session);
  const { playState } = session;

  const videoBps = toBitsPerSecond(
    playState.videoBitrate ?? block?.videoBitrate ?? session.videoBitrate ?? stream.video?.bitrate
  );
  const audioBps = toBitsPerSecond(
    playState.audioBitrate ?? block?.audioBitrate ?? session.audioBitrate ?? stream.audio?.bitrate
  );
  if (videoBps > 0 || audioBps > 0) return { videoBps, audioBps };

  const total =
    toBitsPerSecond(block?.bitrate) ||
    toBitsPerSecond(session.bitrate) ||
    toBitsPerSecond(session.nowPlayingItem?.sourceBitrate);
  return { videoBps: total, audioBps: 0 };
}
