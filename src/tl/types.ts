/**
 * Typed model of the remote schema objects this package sends and receives.
 * Every polymorphic value is a closed union discriminated by `_`, the
 * constructor name used by the platform. Ids are plain numbers; 64-bit access
 * hashes travel as decimal strings so they survive JSON without rounding.
 */

export type Long = string;

export type Peer =
  | { _: "peerUser"; userId: number }
  | { _: "peerChat"; chatId: number }
  | { _: "peerChannel"; channelId: number };

export type InputPeer =
  | { _: "inputPeerEmpty" }
  | { _: "inputPeerSelf" }
  | { _: "inputPeerUser"; userId: number; accessHash: Long }
  | { _: "inputPeerUserFromMessage"; peer: InputPeer; msgId: number; userId: number }
  | { _: "inputPeerChat"; chatId: number }
  | { _: "inputPeerChannel"; channelId: number; accessHash: Long }
  | { _: "inputPeerChannelFromMessage"; peer: InputPeer; msgId: number; channelId: number };

export type InputUser =
  | { _: "inputUserSelf" }
  | { _: "inputUser"; userId: number; accessHash: Long };

export type InputChannel =
  | { _: "inputChannel"; channelId: number; accessHash: Long }
  | { _: "inputChannelFromMessage"; peer: InputPeer; msgId: number; channelId: number };

export interface UserRecord {
  _: "user";
  id: number;
  accessHash?: Long;
  self?: boolean;
  bot?: boolean;
  deleted?: boolean;
  firstName?: string;
  lastName?: string;
  username?: string;
}

export type User = UserRecord | { _: "userEmpty"; id: number };

export interface ChannelRecord {
  _: "channel";
  id: number;
  accessHash?: Long;
  title: string;
  username?: string;
  megagroup?: boolean;
  broadcast?: boolean;
  left?: boolean;
}

export type Chat =
  | { _: "chat"; id: number; title: string; participantsCount: number; left?: boolean; deactivated?: boolean }
  | { _: "chatForbidden"; id: number; title: string }
  | { _: "chatEmpty"; id: number }
  | ChannelRecord
  | { _: "channelForbidden"; id: number; accessHash: Long; title: string };

/** Messages as they appear in a dialog page: delivered, service or an empty placeholder. */
export type Message =
  | { _: "message"; id: number; peerId: Peer; date: number; message: string; out?: boolean }
  | { _: "messageService"; id: number; peerId: Peer; date: number; action: string }
  | { _: "messageEmpty"; id: number; peerId?: Peer };

export interface DialogFolderInfo {
  id: number;
  title: string;
}

export type RawDialog =
  | {
      _: "dialog";
      peer: Peer;
      topMessage: number;
      pinned?: boolean;
      unreadCount: number;
      unreadMentionsCount?: number;
      folderId?: number;
    }
  | {
      _: "dialogFolder";
      folder: DialogFolderInfo;
      peer: Peer;
      topMessage: number;
      pinned?: boolean;
      unreadMutedPeersCount: number;
      unreadUnmutedPeersCount: number;
    };

export interface GetDialogsRequest {
  _: "messages.getDialogs";
  excludePinned: boolean;
  folderId?: number;
  offsetDate: number;
  offsetId: number;
  offsetPeer: InputPeer;
  limit: number;
  /** Cache hash; always 0 so the server never answers "not modified". */
  hash: number;
}

export interface DeleteHistoryRequest {
  _: "messages.deleteHistory";
  justClear: boolean;
  revoke: boolean;
  peer: InputPeer;
  maxId: number;
}

export interface DeleteChatUserRequest {
  _: "messages.deleteChatUser";
  chatId: number;
  userId: InputUser;
}

export interface LeaveChannelRequest {
  _: "channels.leaveChannel";
  channel: InputChannel;
}

export interface DialogsPayload {
  dialogs: RawDialog[];
  messages: Message[];
  chats: Chat[];
  users: User[];
}

export type DialogsResponse =
  | ({ _: "messages.dialogs" } & DialogsPayload)
  | ({ _: "messages.dialogsSlice"; count: number } & DialogsPayload)
  | { _: "messages.dialogsNotModified"; count: number };

export interface AffectedHistory {
  _: "messages.affectedHistory";
  pts: number;
  ptsCount: number;
  offset: number;
}

export type Updates =
  | { _: "updates"; date: number; seq: number }
  | { _: "updatesTooLong" }
  | { _: "updateShort"; date: number };

export interface RpcResultMap {
  "messages.getDialogs": DialogsResponse;
  "messages.deleteHistory": AffectedHistory;
  "messages.deleteChatUser": Updates;
  "channels.leaveChannel": Updates;
}

export type RpcMethod = keyof RpcResultMap;

export type RpcRequest =
  | GetDialogsRequest
  | DeleteHistoryRequest
  | DeleteChatUserRequest
  | LeaveChannelRequest;

export type RpcResult<R extends RpcRequest> = RpcResultMap[R["_"]];
