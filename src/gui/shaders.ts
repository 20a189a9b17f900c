/**
 * 2D shaders. Plain and image sources are compiled with the shared header;
 * text sources only get the minimal one.
 */

export const plainVertexShader = `
in vec2 pos;
in vec4 color;

uniform mat4 matrix;

out vec4 vColor;

void main() {
  vColor = color;
  writeGlPosition2D(matrix * vec4(pos, 0.0, 1.0));
}
`;

export const plainFragmentShader = `
in vec4 vColor;

uniform vec4 uniColor;

void main() {
  vec4 color = vColor * uniColor;
  // Premultiplied alpha
  writeColor2D(vec4(color.rgb * color.a, color.a));
}
`;

export const imageVertexShader = `
in vec2 pos;
in vec2 uv;
in vec4 color;

uniform mat4 matrix;

out vec2 vUv;
out vec4 vColor;

void main() {
  vUv = uv;
  vColor = color;
  writeGlPosition2D(matrix * vec4(pos, 0.0, 1.0));
}
`;

export const imageFragmentShader = `
in vec2 vUv;
in vec4 vColor;

uniform sampler2D tex;
uniform vec4 uniColor;

void main() {
  vec4 color = texture(tex, vUv) * vColor * uniColor;
  writeColor2D(vec4(color.rgb * color.a, color.a));
}
`;

export const textVertexShader = `
in vec2 pos;
in vec2 uv;
in vec4 color;

uniform mat4 matrix;

out vec2 Uv;
out vec4 Color;

void main() {
  gl_Position = matrix * vec4(pos, 0.0, 1.0);
  Uv = uv;
  Color = color;
}
`;

export const textFragmentShader = `
in vec2 Uv;
in vec4 Color;

uniform sampler2D tex;

out vec4 FragColor;

void main() {
  FragColor = vec4(Color.rgb, texture(tex, Uv).r);
  // Premultiplied alpha
  FragColor.rgb *= FragColor.a;
}
`;
