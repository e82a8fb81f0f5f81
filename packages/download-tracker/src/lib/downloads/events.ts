import { z } from "zod";

// ---------------------------------------------------------------------------
// Inbound events (backend -> tracker)
// ---------------------------------------------------------------------------

export const DownloadCreatedEventSchema = z.object({
  type: z.literal("download.created"),
  id: z.string().min(1),
  pageId: z.string().min(1),
  url: z.string(),
  /** Absent while the browser is still resolving Content-Disposition */
  suggestedFilename: z.string().optional(),
  /** Where the browser writes the artifact, when it is on this machine */
  artifactPath: z.string().optional(),
});

export const DownloadFinishedEventSchema = z.object({
  type: z.literal("download.finished"),
  id: z.string().min(1),
  outcome: z.enum(["success", "failure"]),
  reason: z.string().optional(),
  artifactPath: z.string().optional(),
  suggestedFilename: z.string().optional(),
});

export const DownloadCanceledEventSchema = z.object({
  type: z.literal("download.canceled"),
  id: z.string().min(1),
});

export const BackendEventSchema = z.discriminatedUnion("type", [
  DownloadCreatedEventSchema,
  DownloadFinishedEventSchema,
  DownloadCanceledEventSchema,
]);

export type DownloadCreatedEvent = z.infer<typeof DownloadCreatedEventSchema>;
export type DownloadFinishedEvent = z.infer<typeof DownloadFinishedEventSchema>;
export type DownloadCanceledEvent = z.infer<typeof DownloadCanceledEventSchema>;
export type BackendEvent = z.infer<typeof BackendEventSchema>;

// ---------------------------------------------------------------------------
// Outbound requests (tracker -> backend)
// ---------------------------------------------------------------------------

export type BackendRequest =
  | { type: "download.cancel"; id: string }
  | { type: "download.delete"; id: string };

/**
 * Parse one decoded JSON value into a backend event.
 * Returns the zod issues as readable strings on failure.
 */
export function parseBackendEvent(
  value: unknown
): { ok: true; event: BackendEvent } | { ok: false; issues: string[] } {
  const result = BackendEventSchema.safeParse(value);
  if (result.success) {
    return { ok: true, event: result.data };
  }
  return {
    ok: false,
    issues: result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`
    ),
  };
}
