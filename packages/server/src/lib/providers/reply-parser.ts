import {
  ARTIFACT_REFERENCE_PREFIXES,
  MEDIA_KINDS,
  restReplySchema,
  taskOutputSchema,
  type ClientReply,
} from '@genmedia/shared'
import { ResponseParseError } from '../errors.js'
import { isRecord, readString } from '../json.js'
import type { AdapterReply, RawReply } from './types.js'

/**
 * Reduce a raw reply of either transport family to an AdapterReply.
 *
 * A failed transport status short-circuits to `transportOk: false` whatever
 * the body looks like. A 2xx reply whose envelope, `output`, `task_id` or
 * `task_status` has the wrong type raises ResponseParseError; a null or empty
 * `task_id`/`task_status` is reported as absent. Artifact fields never raise:
 * shapes that cannot be walked contribute nothing.
 */
export function parseReply(raw: RawReply): AdapterReply {
  switch (raw.family) {
    case 'client':
      return fromClient(raw.reply)
    case 'rest':
      return fromRest(raw.httpStatus, raw.body)
    default: {
      const unreachable: never = raw
      throw new ResponseParseError('Unrecognized reply family', unreachable)
    }
  }
}

function isOkStatus(status: number): boolean {
  return status >= 200 && status < 300
}

function fromClient(reply: ClientReply): AdapterReply {
  const httpStatus = reply.statusCode
  if (!isOkStatus(httpStatus)) {
    return { transportOk: false, httpStatus, requestId: reply.requestId, raw: reply, artifacts: [] }
  }
  return reduceOutput(httpStatus, reply.output, reply.requestId, reply.usage, reply)
}

function fromRest(httpStatus: number, body: unknown): AdapterReply {
  if (!isOkStatus(httpStatus)) {
    const requestId = isRecord(body) ? readString(body.request_id) : undefined
    return { transportOk: false, httpStatus, requestId, raw: body, artifacts: [] }
  }
  if (body === undefined || body === null) {
    return { transportOk: false, httpStatus, raw: body, artifacts: [] }
  }
  const parsed = restReplySchema.safeParse(body)
  if (!parsed.success) {
    throw new ResponseParseError('Reply body is not a recognized envelope', body, {
      cause: parsed.error,
    })
  }
  return reduceOutput(
    httpStatus,
    parsed.data.output,
    parsed.data.request_id,
    parsed.data.usage,
    body,
  )
}

function reduceOutput(
  httpStatus: number,
  output: unknown,
  requestId: string | undefined,
  usage: unknown,
  raw: unknown,
): AdapterReply {
  // A reply without `output` is a transport-level failure, not a parse error.
  if (output === undefined || output === null) {
    return { transportOk: false, httpStatus, requestId, raw, artifacts: [] }
  }
  const parsed = taskOutputSchema.safeParse(output)
  if (!parsed.success) {
    throw new ResponseParseError('Reply output is not a recognized shape', raw, {
      cause: parsed.error,
    })
  }
  return {
    transportOk: true,
    httpStatus,
    taskId: parsed.data.task_id || undefined,
    status: parsed.data.task_status || undefined,
    requestId,
    raw,
    // Walk the reply itself: zod rebuilds objects in schema key order.
    artifacts: isRecord(output) ? extractArtifacts(output) : [],
    usage,
  }
}

// ─── Artifact extraction ───

type Collector = (value: unknown, into: string[]) => void

function looksLikeReference(value: string): boolean {
  return ARTIFACT_REFERENCE_PREFIXES.some((prefix) => value.startsWith(prefix))
}

const collectField: Collector = (value, into) => {
  const ref = readString(value)
  if (ref) into.push(ref)
}

const collectBareString: Collector = (value, into) => {
  const ref = readString(value)
  if (ref && looksLikeReference(ref)) into.push(ref)
}

const collectMediaRecord: Collector = (value, into) => {
  if (!isRecord(value)) return
  for (const key of MEDIA_KINDS) {
    collectField(value[key], into)
  }
}

const collectResults: Collector = (value, into) => {
  if (!Array.isArray(value)) return
  for (const item of value) {
    if (isRecord(item)) collectField(item.url, into)
    else collectBareString(item, into)
  }
}

// content may be a string, a list of mixed string/record items, or a single record
const collectContent: Collector = (content, into) => {
  if (typeof content === 'string') {
    collectBareString(content, into)
  } else if (Array.isArray(content)) {
    for (const item of content) {
      if (isRecord(item)) collectMediaRecord(item, into)
      else collectBareString(item, into)
    }
  } else {
    collectMediaRecord(content, into)
  }
}

const collectChoices: Collector = (value, into) => {
  if (!Array.isArray(value)) return
  for (const choice of value) {
    if (!isRecord(choice) || !isRecord(choice.message)) continue
    collectContent(choice.message.content, into)
  }
}

const collectAudio: Collector = (value, into) => {
  if (isRecord(value)) collectField(value.url, into)
}

const ARTIFACT_COLLECTORS = new Map<string, Collector>([
  ['video_url', collectField],
  ['image_url', collectField],
  ['results', collectResults],
  ['choices', collectChoices],
  ['audio', collectAudio],
])

/**
 * Collect every non-empty artifact reference in `output`, following the
 * reply's own key order so the result keeps encounter order.
 */
export function extractArtifacts(output: Record<string, unknown>): string[] {
  const found: string[] = []
  for (const [key, value] of Object.entries(output)) {
    ARTIFACT_COLLECTORS.get(key)?.(value, found)
  }
  return found
}
