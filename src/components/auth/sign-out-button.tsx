import { LogOut } from "lucide-react";

import { Button } from "@/components/ui/button";

export function SignOutAction({ label = "Log out" }: { label?: string }) {
  return (
    <form action="/auth/logout" method="post">
      <Button type="submit" variant="outline" size="sm">
        <LogOut className="mr-2 h-4 w-4" aria-hidden="true" />
        {label}
      </Button>
    </form>
  );
}
