"use client";

import type { FormEvent } from "react";
import { Trash2 } from "lucide-react";

import { Button } from "@/components/ui/button";

interface DeleteMessageFormProps {
  messageId: number;
  confirmText?: string;
}

export function DeleteMessageForm({
  messageId,
  confirmText = "Delete this message? This cannot be undone.",
}: DeleteMessageFormProps) {
  function handleSubmit(event: FormEvent<HTMLFormElement>) {
    if (!window.confirm(confirmText)) event.preventDefault();
  }

  return (
    <form action={`/messages/${messageId}/delete`} method="post" onSubmit={handleSubmit}>
      <Button type="submit" variant="destructive" size="sm">
        <Trash2 className="mr-2 h-4 w-4" aria-hidden="true" />
        Delete message
      </Button>
    </form>
  );
}
