import type { DestinationId } from '../models/Job'

/** Outbound side of the chat platform, as the pipeline sees it. */
export interface Transport {
  notify(destinationId: DestinationId, text: string): Promise<void>
  deliverVideo(destinationId: DestinationId, filePath: string, caption: string): Promise<void>
}
