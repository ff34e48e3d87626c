import { MessageCard } from "@/components/messages/message-card";
import type { MessageWithAuthor } from "@/lib/messages";

interface MessageListProps {
  messages: MessageWithAuthor[];
  emptyText?: string;
}

export function MessageList({ messages, emptyText = "No messages yet." }: MessageListProps) {
  if (messages.length === 0) {
    return <p className="rounded-md border border-dashed border-slate-300 p-6 text-center text-sm text-slate-500">{emptyText}</p>;
  }

  return (
    <ul className="rounded-md border border-slate-200 bg-white">
      {messages.map((message) => (
        <MessageCard key={message.id} message={message} />
      ))}
    </ul>
  );
}
