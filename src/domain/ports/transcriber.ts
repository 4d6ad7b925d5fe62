/**
 * Port interface for the external speech-to-text service.
 * Implementations throw on failure; callers turn that into a user-facing message.
 */
export interface ITranscriber {
  transcribe(audio: Buffer, fileName: string): Promise<string>;
}
