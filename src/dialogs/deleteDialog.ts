import { unknownConstructor } from "../errors";
import { DeleteChatUserRequest, DeleteHistoryRequest, InputPeer, LeaveChannelRequest } from "../tl/types";
import { InvokeOptions, RpcTransport } from "../transports/Transport";

/**
 * Removes a conversation from the caller's dialog list.
 *
 * Private conversations get their history cleared for the caller only; basic
 * groups and channels are left. The conversation itself is never deleted: the
 * other participants keep it, along with its full history.
 *
 * Resolves with nothing once the single remote call succeeds. An empty peer
 * resolves immediately without touching the transport.
 */
export async function deleteDialog(
  transport: RpcTransport,
  peer: InputPeer,
  options: InvokeOptions = {},
): Promise<void> {
  switch (peer._) {
    case "inputPeerEmpty":
      return;
    case "inputPeerSelf":
    case "inputPeerUser":
    case "inputPeerUserFromMessage": {
      const request: DeleteHistoryRequest = {
        _: "messages.deleteHistory",
        justClear: false,
        revoke: false,
        peer,
        maxId: 0,
      };
      await transport.invoke(request, options);
      return;
    }
    case "inputPeerChat": {
      const request: DeleteChatUserRequest = {
        _: "messages.deleteChatUser",
        chatId: peer.chatId,
        userId: { _: "inputUserSelf" },
      };
      await transport.invoke(request, options);
      return;
    }
    case "inputPeerChannel": {
      const request: LeaveChannelRequest = {
        _: "channels.leaveChannel",
        channel: { _: "inputChannel", channelId: peer.channelId, accessHash: peer.accessHash },
      };
      await transport.invoke(request, options);
      return;
    }
    case "inputPeerChannelFromMessage": {
      const request: LeaveChannelRequest = {
        _: "channels.leaveChannel",
        channel: { _: "inputChannelFromMessage", peer: peer.peer, msgId: peer.msgId, channelId: peer.channelId },
      };
      await transport.invoke(request, options);
      return;
    }
    default:
      return unknownConstructor("input peer", peer);
  }
}
