/**
 * Renderer Configuration
 */

import { z } from 'zod';

const size = z.number().int().min(16).max(1024).default(128);

export const TextRendererConfigSchema = z.object({
  size,
  maxLines: z.number().int().positive().default(8),
  maxColumns: z.number().int().min(4).default(40)
});

export const SvgRendererConfigSchema = z.object({
  size
});

export const PlaceholderRendererConfigSchema = z.object({
  size
});

export type TextRendererConfig = z.infer<typeof TextRendererConfigSchema>;
export type SvgRendererConfig = z.infer<typeof SvgRendererConfigSchema>;
export type PlaceholderRendererConfig = z.infer<typeof PlaceholderRendererConfigSchema>;
