import { describe, it, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import { z } from 'zod'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import { ConfigurationError } from '../../src/lib/errors.js'
import { createBundleServer } from '../../src/mcp/bundle-server.js'
import { createDefaultRegistry } from '../../src/registry.js'
import { FakeAdapter, reply } from '../helpers.js'

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
})

function readResult(result: unknown) {
  const parsed = toolResultSchema.parse(result)
  return { isError: parsed.isError ?? false, text: parsed.content[0].text }
}

describe('createBundleServer', () => {
  const cleanup: Array<() => Promise<void>> = []

  afterEach(async () => {
    for (const close of cleanup.splice(0)) await close()
  })

  async function connect(adapter: FakeAdapter, bundle: string) {
    const registry = createDefaultRegistry({ adapter })
    const server = createBundleServer(bundle, { registry, context: { apiKey: 'test-secret' } })
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
    await server.connect(serverTransport)
    const client = new Client({ name: 'bundle-test', version: '1.0.0' })
    await client.connect(clientTransport)
    cleanup.push(
      () => client.close(),
      () => server.close(),
    )
    return client
  }

  it('lists every component of the bundle as a tool', async () => {
    const client = await connect(new FakeAdapter(), 'modelstudio_wan_video')

    const { tools } = await client.listTools()

    assert.deepEqual(
      tools.map((t) => t.name),
      [
        'modelstudio_image_to_video_fl_wan22_submit_task',
        'modelstudio_image_to_video_by_first_and_last_frame_wan22_fetch_result',
      ],
    )
    assert.ok(client.getInstructions()?.includes('Wan'))
  })

  it('answers tool calls with the component output as JSON', async () => {
    const adapter = new FakeAdapter(reply({ taskId: 't1', status: 'PENDING', requestId: 'r1' }))
    const client = await connect(adapter, 'modelstudio_wan_video')

    const result = await client.callTool({
      name: 'modelstudio_image_to_video_fl_wan22_submit_task',
      arguments: { first_frame_url: 'https://x/a.png', last_frame_url: 'https://x/b.png' },
    })

    const { isError, text } = readResult(result)
    assert.equal(isError, false)
    assert.deepEqual(JSON.parse(text), { task_id: 't1', task_status: 'PENDING', request_id: 'r1' })
    assert.deepEqual(adapter.calls.map((c) => c.apiKey), ['test-secret'])
  })

  it('reports generation failures as tool errors', async () => {
    const adapter = new FakeAdapter(reply({ taskId: 't1', status: 'FAILED', requestId: 'r1' }))
    const client = await connect(adapter, 'modelstudio_wan26_media')

    const result = await client.callTool({
      name: 'modelstudio_wan_video_fetch',
      arguments: { task_id: 't1' },
    })

    assert.deepEqual(readResult(result), {
      isError: true,
      text: 'TERMINAL_TASK_FAILURE: Task t1 ended with status FAILED: {"stub":true}',
    })
  })

  it('refuses an unknown bundle', () => {
    assert.throws(() => createBundleServer('nope'), ConfigurationError)
  })
})
