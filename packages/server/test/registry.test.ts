import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { KeyframeToVideoFetch, WanVideoFetch } from '../src/components/index.js'
import { RegistryConfigurationError } from '../src/lib/errors.js'
import { CapabilityRegistry, createDefaultRegistry, defaultRegistry } from '../src/registry.js'
import { FakeAdapter } from './helpers.js'

describe('defaultRegistry', () => {
  it('carries the built-in bundles in order', () => {
    assert.deepEqual(defaultRegistry.list(), [
      'modelstudio_wan_video',
      'modelstudio_qwen_text_to_speech',
      'modelstudio_wan26_media',
    ])
  })

  it('orders the wan2.6 bundle components', () => {
    const bundle = defaultRegistry.get('modelstudio_wan26_media')
    assert.ok(bundle)
    assert.deepEqual(
      bundle.components.map((c) => c.name),
      [
        'modelstudio_wanx26_image_generation',
        'modelstudio_text_to_video_wan26_submit_task',
        'modelstudio_image_to_video_wan26_submit_task',
        'modelstudio_wan_video_fetch',
        'modelstudio_image_edit_wan26',
        'modelstudio_video_to_video_wan26_submit_task',
      ],
    )
  })

  it('pairs the keyframe submit with its own fetch', () => {
    assert.deepEqual(
      defaultRegistry.get('modelstudio_wan_video')?.components.map((c) => c.name),
      [
        'modelstudio_image_to_video_fl_wan22_submit_task',
        'modelstudio_image_to_video_by_first_and_last_frame_wan22_fetch_result',
      ],
    )
  })

  it('finds components by name across bundles', () => {
    assert.equal(
      defaultRegistry.findComponent('modelstudio_qwen_text_to_speech')?.name,
      'modelstudio_qwen_text_to_speech',
    )
    assert.equal(defaultRegistry.findComponent('nope'), undefined)
    assert.equal(defaultRegistry.get('nope'), undefined)
  })

  it('exports frozen bundles with component specs', () => {
    const exported = defaultRegistry.toExport()

    assert.ok(Object.isFrozen(exported))
    assert.deepEqual(Object.keys(exported), defaultRegistry.list())
    const media = exported.modelstudio_wan26_media
    assert.ok(media.instructions.length > 0)
    assert.equal(media.components.length, 6)
    assert.equal(media.components[0].name, 'modelstudio_wanx26_image_generation')
    assert.equal(media.components[0].inputSchema.type, 'object')
  })

  it('cannot be extended after construction', () => {
    assert.ok(Object.isFrozen(defaultRegistry))
    assert.ok(Object.isFrozen(defaultRegistry.entries()[0].components))
  })
})

describe('CapabilityRegistry', () => {
  const adapter = new FakeAdapter()

  it('rejects a component name used twice across bundles', () => {
    assert.throws(
      () =>
        new CapabilityRegistry({
          first: { instructions: 'a', components: [new WanVideoFetch({ adapter })] },
          second: { instructions: 'b', components: [new WanVideoFetch({ adapter })] },
        }),
      RegistryConfigurationError,
    )
  })

  it('accepts distinct names', () => {
    const registry = new CapabilityRegistry({
      video: {
        instructions: 'fetch only',
        components: [new WanVideoFetch({ adapter }), new KeyframeToVideoFetch({ adapter })],
      },
    })
    assert.deepEqual(registry.list(), ['video'])
    assert.equal(registry.entries()[0].components.length, 2)
  })

  it('builds the defaults over injected dependencies', () => {
    const registry = createDefaultRegistry({ adapter, credentials: () => 'test-secret' })
    assert.deepEqual(registry.list(), defaultRegistry.list())
  })
})
