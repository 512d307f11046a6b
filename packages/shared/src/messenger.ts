export type SendOptions = {
  parseMode?: "HTML";
};

export type MessageButton = {
  label: string;
  // Opaque callback payload, already keyed to the recipient's ritual state.
  token: string;
};

// Chat transport used by the scheduling core. Implementations report failures as `false`, never throw.
export interface Messenger {
  sendMessage(userId: number, text: string, options?: SendOptions): Promise<boolean>;
  sendWithButtons(userId: number, text: string, buttons: MessageButton[], options?: SendOptions): Promise<boolean>;
  checkChannelMembership(userId: number): Promise<boolean>;
  // null when membership could not be determined
  isGroupMember(groupId: number, userId: number): Promise<boolean | null>;
  removeFromGroup(groupId: number, userId: number): Promise<boolean>;
  restoreToGroup(groupId: number, userId: number): Promise<boolean>;
  sendToGroup(groupId: number, text: string, options?: SendOptions): Promise<boolean>;
}
