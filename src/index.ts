/**
 * glkit - typed WebGL2 wrappers with a bind-state cache, and a small GUI toolkit
 */

export const VERSION = "0.1.0";

// GL layer
export { GlContext, DEFAULT_CONTEXT_OPTIONS, type ContextOptions, type GlFlag } from "./gl/GlContext";
export { StateCache, DRAW_2D, draw3d, type DrawMode, type BoundTexture } from "./gl/StateCache";
export { ResourceId, type ProgramId, type TextureId, type FramebufferId } from "./gl/ResourceId";
export { Buffer, type BufferTarget, type MeshUsage } from "./gl/Buffer";
export { GlProgram, compileShader, linkProgram, type ShaderType } from "./gl/Program";
export { addShaderHeader, addShaderMinimalHeader } from "./gl/shaderHeader";
export * from "./gl/uniforms";
export {
  attributeStride,
  writeVec2,
  writeVec3,
  writeVec4,
  writeMat4,
  type Attributes,
  type VertexLayout,
} from "./gl/vertex";
export { Mesh, MeshBuilder, MAX_MESH_INDEX, type Primitive, type IndexedPrimitive } from "./gl/Mesh";
export {
  Texture2d,
  DEFAULT_TEXTURE_OPTIONS,
  type TextureFormat,
  type TextureOptions,
  type TextureImage,
  type MinFilter,
  type MagFilter,
  type WrapMode,
} from "./gl/Texture2d";
export { Framebuffer, Renderbuffer, type FramebufferAttachment } from "./gl/Framebuffer";
export {
  Surface,
  ScreenSurface,
  clearColor,
  CLEAR_DEPTH,
  type ClearBuffer,
  type ClearColor,
  type WindowMode,
} from "./gl/Surface";
export { Rect } from "./gl/Rect";
export {
  takeScreenshot,
  screenshotFileName,
  screenshotToDataUrl,
  type Screenshot,
} from "./gl/screenshot";

// GUI
export { Color4, writeColor } from "./gui/Color4";
export { Draw2d, Draw2dPrograms, computeOrthoMatrix } from "./gui/Draw2d";
export {
  Font,
  CanvasGlyphRasterizer,
  DEFAULT_ATLAS_SIZE,
  type FontOptions,
  type GlyphRasterizer,
  type GlyphBitmap,
  type FontMetrics,
} from "./gui/Font";
export * from "./gui/events";
export { EventState } from "./gui/EventState";
export {
  setupEventCallbacks,
  domEventTargets,
  type EventSource,
  type EventTargets,
  type EventCallback,
} from "./gui/EventSource";
export { startMainLoop, type App, type MainLoop, type MainLoopOptions } from "./gui/mainLoop";
export { Stopwatch } from "./gui/Stopwatch";
export { Assets, type AssetsOptions } from "./gui/Assets";
export { createTheme, DEFAULT_THEME_COLORS, type Theme, type ThemeColors } from "./gui/Theme";
export {
  Gui,
  GuiEventResult,
  BaseWidget,
  minSizeOf,
  newWidgetId,
  type Widget,
  type WidgetId,
  type Component,
  type DrawParams,
  type MinSizeParams,
  type MinSizes,
  type GuiResult,
} from "./gui/Gui";
export * from "./gui/widgets";

// Math and geometry
export * as mat4 from "./math/mat4";
export * as vec2 from "./math/vec2";
export { tessellatePolygon, type Ring, type Tessellation } from "./geometry/tessellate";
export { createLogger, setLogLevel, getLogLevel, type LogLevel, type Logger } from "./log";
