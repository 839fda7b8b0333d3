// Encodes a framebuffer with sharp. writeImage picks the format from the file
// extension (.png, .jpg, .webp, ...).

import sharp from "sharp";
import type { Sharp } from "sharp";
import type { Framebuffer } from "../engine/Framebuffer";

function toSharp(framebuffer: Framebuffer): Sharp {
  const { width, height } = framebuffer;
  return sharp(Buffer.from(framebuffer.toRgba8().buffer), {
    raw: { width, height, channels: 4 },
  });
}

export async function encodePng(framebuffer: Framebuffer): Promise<Buffer> {
  return toSharp(framebuffer).png().toBuffer();
}

export async function writeImage(filePath: string, framebuffer: Framebuffer): Promise<void> {
  await toSharp(framebuffer).toFile(filePath);
}
