'use client';

import { useEffect, useState } from 'react';
import { Flag, X, AlertTriangle, Info } from 'lucide-react';
import { toast } from 'sonner';
import { onCtfResult, type CtfResult } from '@/lib/api-client';

interface FlagPopupProps {
  result: CtfResult;
  onClose: () => void;
}

const tone = {
  success: 'border-emerald-300 bg-emerald-50 text-emerald-900',
  info: 'border-blue-300 bg-blue-50 text-blue-900',
  warning: 'border-amber-300 bg-amber-50 text-amber-900',
} as const;

export function FlagPopup({ result, onClose }: FlagPopupProps) {
  const kind = result.notification_type ?? 'info';
  const title = result.bug_title ?? result.bug_type ?? 'Vulnerability detected';
  const Icon = kind === 'warning' ? AlertTriangle : kind === 'success' ? Flag : Info;

  const copyFlag = async () => {
    if (!result.flag) return;
    try {
      await navigator.clipboard.writeText(result.flag);
      toast.success('Flag copied');
    } catch {
      toast.error('Could not copy the flag');
    }
  };

  return (
    <div role="dialog" aria-label={title} className={`w-80 rounded-lg border p-4 shadow-lg ${tone[kind]}`}>
      <div className="flex items-start gap-2">
        <Icon className="mt-0.5 h-4 w-4 shrink-0" />
        <div className="flex-1">
          <h3 className="text-sm font-semibold">{title}</h3>
          {result.ctf_message && <p className="mt-1 text-xs">{result.ctf_message}</p>}
          {result.warning_message && <p className="mt-1 text-xs">{result.warning_message}</p>}
          {result.description && <p className="mt-1 text-xs opacity-80">{result.description}</p>}
          {result.ctf_total_points !== undefined && (
            <p className="mt-2 text-xs font-medium">Total: {result.ctf_total_points} points</p>
          )}
          {result.flag && (
            <button
              type="button"
              onClick={copyFlag}
              className="mt-2 block w-full truncate rounded bg-white/70 px-2 py-1 text-left font-mono text-xs hover:bg-white"
            >
              {result.flag}
            </button>
          )}
        </div>
        <button type="button" aria-label="Close" onClick={onClose} className="opacity-60 hover:opacity-100">
          <X className="h-4 w-4" />
        </button>
      </div>
    </div>
  );
}

/** Shows the most recent CTF body any API call received. */
export function FlagPopupHost() {
  const [result, setResult] = useState<CtfResult | null>(null);

  useEffect(() => onCtfResult(setResult), []);

  if (!result) return null;
  return (
    <div className="fixed bottom-4 right-4 z-50">
      <FlagPopup result={result} onClose={() => setResult(null)} />
    </div>
  );
}
