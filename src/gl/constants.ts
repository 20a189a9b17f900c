// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)

// Buffers
export const GL_ARRAY_BUFFER = 0x8892;
export const GL_ELEMENT_ARRAY_BUFFER = 0x8893;
export const GL_STATIC_DRAW = 0x88e4;
export const GL_DYNAMIC_DRAW = 0x88e8;
export const GL_STREAM_DRAW = 0x88e0;

// Data types
export const GL_UNSIGNED_BYTE = 0x1401;
export const GL_UNSIGNED_SHORT = 0x1403;
export const GL_FLOAT = 0x1406;

// Primitives
export const GL_POINTS = 0x0000;
export const GL_LINES = 0x0001;
export const GL_LINE_LOOP = 0x0002;
export const GL_LINE_STRIP = 0x0003;
export const GL_TRIANGLES = 0x0004;
export const GL_TRIANGLE_STRIP = 0x0005;
export const GL_TRIANGLE_FAN = 0x0006;

// Capabilities and blending
export const GL_CULL_FACE = 0x0b44;
export const GL_DEPTH_TEST = 0x0b71;
export const GL_BLEND = 0x0be2;
export const GL_ONE = 1;
export const GL_ONE_MINUS_SRC_ALPHA = 0x0303;

// Pixel storage
export const GL_UNPACK_ALIGNMENT = 0x0cf5;
export const GL_PACK_ALIGNMENT = 0x0d05;

// Shaders
export const GL_FRAGMENT_SHADER = 0x8b30;
export const GL_VERTEX_SHADER = 0x8b31;
export const GL_COMPILE_STATUS = 0x8b81;
export const GL_LINK_STATUS = 0x8b82;

// Textures
export const GL_TEXTURE_2D = 0x0de1;
export const GL_TEXTURE0 = 0x84c0;
export const GL_TEXTURE_MAG_FILTER = 0x2800;
export const GL_TEXTURE_MIN_FILTER = 0x2801;
export const GL_TEXTURE_WRAP_S = 0x2802;
export const GL_TEXTURE_WRAP_T = 0x2803;
export const GL_NEAREST = 0x2600;
export const GL_LINEAR = 0x2601;
export const GL_NEAREST_MIPMAP_NEAREST = 0x2700;
export const GL_LINEAR_MIPMAP_NEAREST = 0x2701;
export const GL_NEAREST_MIPMAP_LINEAR = 0x2702;
export const GL_LINEAR_MIPMAP_LINEAR = 0x2703;
export const GL_REPEAT = 0x2901;
export const GL_CLAMP_TO_EDGE = 0x812f;

// Pixel formats
export const GL_RED = 0x1903;
export const GL_RGB = 0x1907;
export const GL_RGBA = 0x1908;
export const GL_RGB8 = 0x8051;
export const GL_RGBA8 = 0x8058;
export const GL_R8 = 0x8229;
export const GL_SRGB8 = 0x8c41;
export const GL_SRGB8_ALPHA8 = 0x8c43;

// Framebuffers
export const GL_READ_FRAMEBUFFER = 0x8ca8;
export const GL_DRAW_FRAMEBUFFER = 0x8ca9;
export const GL_FRAMEBUFFER = 0x8d40;
export const GL_RENDERBUFFER = 0x8d41;
export const GL_COLOR_ATTACHMENT0 = 0x8ce0;
export const GL_FRAMEBUFFER_COMPLETE = 0x8cd5;
export const GL_FRAMEBUFFER_INCOMPLETE_ATTACHMENT = 0x8cd6;
export const GL_FRAMEBUFFER_INCOMPLETE_MISSING_ATTACHMENT = 0x8cd7;
export const GL_FRAMEBUFFER_UNSUPPORTED = 0x8cdd;
export const GL_MAX_SAMPLES = 0x8d57;

// Clearing
export const GL_DEPTH_BUFFER_BIT = 0x00000100;
export const GL_COLOR_BUFFER_BIT = 0x00004000;

// Errors
export const GL_NO_ERROR = 0;
export const GL_INVALID_ENUM = 0x0500;
export const GL_INVALID_VALUE = 0x0501;
export const GL_INVALID_OPERATION = 0x0502;
export const GL_OUT_OF_MEMORY = 0x0505;
export const GL_INVALID_FRAMEBUFFER_OPERATION = 0x0506;
export const GL_CONTEXT_LOST_WEBGL = 0x9242;

// Renderer info (WEBGL_debug_renderer_info)
export const GL_UNMASKED_VENDOR_WEBGL = 0x9245;
export const GL_UNMASKED_RENDERER_WEBGL = 0x9246;
