import path from 'path';

export type PdfBackend = 'poppler' | 'pdf-parse';

export interface ViewerConfig {
  port: number;
  resultsDir: string;
  pdfDir: string;
  sectionLabel: string;
  renderDpi: number;
  pdfBackend: PdfBackend;
  toolFallbackDir: string;
  pdftotextPath?: string;
  pdfinfoPath?: string;
  toolTimeoutMs: number;   // 0 = no timeout
  sessionTtlSeconds: number;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  port: 8080,
  resultsDir: 'data/results',
  pdfDir: 'data/pdfs',
  sectionLabel: '4.1',
  renderDpi: 120,
  toolFallbackDir: '/opt/homebrew/bin',
  toolTimeoutMs: 30000,
  sessionTtlSeconds: 14400, // 4 hours
};

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[CONFIG] Ignoring ${name}=${raw} (expected integer >= ${min}), using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBackend(env: Env): PdfBackend {
  const raw = env.PDF_BACKEND?.trim();
  if (!raw) return 'poppler';
  if (raw === 'poppler' || raw === 'pdf-parse') return raw;
  console.warn(`[CONFIG] Unknown PDF_BACKEND=${raw}, using poppler`);
  return 'poppler';
}

function optional(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Build the viewer configuration from environment variables.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ViewerConfig {
  return {
    port: readInt(env, 'PORT', DEFAULTS.port, 0),
    resultsDir: path.resolve(cwd, optional(env, 'RESULTS_DIR') ?? DEFAULTS.resultsDir),
    pdfDir: path.resolve(cwd, optional(env, 'PDF_DIR') ?? DEFAULTS.pdfDir),
    sectionLabel: optional(env, 'SECTION_LABEL') ?? DEFAULTS.sectionLabel,
    renderDpi: readInt(env, 'RENDER_DPI', DEFAULTS.renderDpi, 1),
    pdfBackend: readBackend(env),
    toolFallbackDir: optional(env, 'TOOL_FALLBACK_DIR') ?? DEFAULTS.toolFallbackDir,
    pdftotextPath: optional(env, 'PDFTOTEXT_PATH'),
    pdfinfoPath: optional(env, 'PDFINFO_PATH'),
    toolTimeoutMs: readInt(env, 'TOOL_TIMEOUT_MS', DEFAULTS.toolTimeoutMs, 0),
    sessionTtlSeconds: readInt(env, 'SESSION_TTL_SECONDS', DEFAULTS.sessionTtlSeconds, 1),
  };
}
