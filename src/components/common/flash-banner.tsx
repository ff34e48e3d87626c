import type { Flash, FlashTone } from "@/lib/flash";
import { cn } from "@/lib/utils";

const toneClasses: Record<FlashTone, string> = {
  success: "border-emerald-200 bg-emerald-50 text-emerald-900",
  danger: "border-red-200 bg-red-50 text-red-900",
  info: "border-sky-200 bg-sky-50 text-sky-900",
};

export function FlashBanner({ flash }: { flash: Flash | null }) {
  if (!flash) return null;

  return (
    <div role="alert" className={cn("mb-4 rounded-md border px-4 py-3 text-sm", toneClasses[flash.tone])}>
      {flash.message}
    </div>
  );
}
