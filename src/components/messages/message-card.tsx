import Link from "next/link";

import type { MessageWithAuthor } from "@/lib/messages";
import { formatMessageDate } from "@/lib/format/timestamp";

export function MessageCard({ message }: { message: MessageWithAuthor }) {
  return (
    <li className="border-b border-slate-200 px-4 py-3 last:border-b-0">
      <div className="flex items-center justify-between text-xs text-slate-500">
        <Link href={`/users/${message.user.id}`} className="font-medium text-slate-900 hover:underline">
          @{message.user.username}
        </Link>
        <time dateTime={message.timestamp.toISOString()}>{formatMessageDate(message.timestamp)}</time>
      </div>
      <p className="mt-1 text-sm text-slate-800">
        <Link href={`/messages/${message.id}`} className="hover:underline">
          {message.text}
        </Link>
      </p>
    </li>
  );
}
