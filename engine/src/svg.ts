import type { FontWeight, HexColor, TextLabel, VectorScene } from "./types.js";

export interface TextOverlay {
  labels: TextLabel[];
  fontSize: number;
  fontFamily: string;
  fontWeight: FontWeight;
  color: HexColor;
}

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

function textElement(label: TextLabel, overlay: TextOverlay): string {
  return (
    `<text x="${label.x}" y="${label.y}" font-family="${escapeXml(overlay.fontFamily)}" ` +
    `font-size="${overlay.fontSize}" font-weight="${overlay.fontWeight}" fill="${overlay.color}">` +
    `${escapeXml(label.text)}</text>`
  );
}

/** Serialize a scene, with an optional text layer drawn above every region. */
export function sceneToSvg(scene: VectorScene, overlay?: TextOverlay): string {
  const lines = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${scene.width}" height="${scene.height}" viewBox="0 0 ${scene.width} ${scene.height}">`,
    `<rect x="0" y="0" width="${scene.width}" height="${scene.height}" style="fill:${scene.background}"/>`,
  ];
  for (const element of scene.elements) {
    lines.push(`<path d="${element.path}" style="${element.style}"/>`);
  }
  if (overlay && overlay.labels.length > 0) {
    lines.push("<g>");
    for (const label of overlay.labels) lines.push(textElement(label, overlay));
    lines.push("</g>");
  }
  lines.push("</svg>");
  return lines.join("\n");
}
