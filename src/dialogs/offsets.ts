import { unknownConstructor } from "../errors";
import { Message } from "../tl/types";

export interface DialogOffsets {
  offsetDate: number;
  offsetId: number;
}

/**
 * Offsets for the page after the one whose last message is `message`.
 * An empty placeholder has no timestamp, so it only moves `offsetId` and
 * keeps whatever `offsetDate` the previous page left behind.
 */
export function deriveOffsets(message: Message, current: DialogOffsets): DialogOffsets {
  switch (message._) {
    case "message":
    case "messageService":
      return { offsetDate: message.date, offsetId: message.id };
    case "messageEmpty":
      return { offsetDate: current.offsetDate, offsetId: message.id };
    default:
      return unknownConstructor("message", message);
  }
}
