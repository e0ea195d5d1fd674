function env(key: string, fallback: string): string {
  return process.env[key] || fallback
}

/** Parse an integer env var, returning fallback when missing or NaN (but NOT when 0). */
function intEnv(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined || raw === '') return fallback
  const val = parseInt(raw, 10)
  return Number.isNaN(val) ? fallback : val
}

const isProduction = process.env.NODE_ENV === 'production'

export const config = {
  isProduction,
  dashscopeBaseUrl: env('DASHSCOPE_BASE_URL', 'https://dashscope.aliyuncs.com/api/v1').replace(
    /\/+$/,
    '',
  ),
  // Per-request transport timeout. The gateway itself never times out a task.
  requestTimeoutMs: Math.max(1_000, Math.min(600_000, intEnv('GENMEDIA_REQUEST_TIMEOUT_MS', 60_000))),
  models: {
    imageGeneration: env('IMAGE_GENERATION_MODEL_NAME', 'wan2.6-t2i'),
    imageEdit: env('IMAGE_EDIT_MODEL_NAME', 'wan2.6-image'),
    keyframeToVideo: env('IMAGE_TO_VIDEO_KF2V_MODEL_NAME', 'wan2.2-kf2v-flash'),
    textToVideo: env('TEXT_TO_VIDEO_MODEL_NAME', 'wan2.6-t2v'),
    imageToVideo: env('IMAGE_TO_VIDEO_MODEL_NAME', 'wan2.6-i2v'),
    videoToVideo: env('VIDEO_TO_VIDEO_MODEL_NAME', 'wan2.6-r2v'),
    textToSpeech: env('TEXT_TO_SPEECH_MODEL_NAME', 'qwen-tts'),
  },
  mcp: {
    serverName: env('GENMEDIA_MCP_NAME', 'genmedia'),
  },
}

export type Config = typeof config
