/**
 * Picks the screenshot URLs out of a DM's attachments.
 */
export interface AttachmentLike {
  url: string;
  filename: string;
  contentType?: string | null;
}

const IMAGE_EXTENSION = /\.(png|jpe?g|gif|webp)$/i;

export function imageUrls(attachments: readonly AttachmentLike[]): string[] {
  return attachments
    .filter((file) =>
      file.contentType ? file.contentType.startsWith("image/") : IMAGE_EXTENSION.test(file.filename),
    )
    .map((file) => file.url);
}
