export { Component, type AnyComponent, type ComponentDeps, type RunOptions } from './base.js'
export { TaskSubmitComponent, GenerationComponent, VideoFetchComponent } from './task-components.js'
export { KeyframeToVideoSubmit, KeyframeToVideoFetch } from './keyframe-to-video.js'
export {
  TextToVideoSubmit,
  ImageToVideoSubmit,
  VideoToVideoSubmit,
  WanVideoFetch,
} from './video-generation.js'
export { ImageGenerationWan26, ImageEditWan26 } from './image-generation.js'
export { QwenTextToSpeech } from './text-to-speech.js'
