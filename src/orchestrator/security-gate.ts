import type { ExecutionMode } from '../config/validator';

export type RiskTier = 'safe' | 'caution' | 'dangerous' | 'blocked';

export interface SecurityVerdict {
  tier: RiskTier;
  rationale: string;
  /** Name of the signature that matched, if any */
  pattern?: string;
}

export type GateDecision = 'allow' | 'confirm' | 'reject';

export interface CommandSignature {
  name: string;
  test: (command: string) => boolean;
}

export interface SecurityPolicy {
  /** Disables command execution entirely: every verdict becomes `blocked` */
  killSwitch?: boolean;
  /** Extra regular expressions (source strings) treated as dangerous */
  dangerousPatterns?: string[];
  /** Extra regular expressions (source strings) treated as caution */
  cautionPatterns?: string[];
}

const regex =
  (name: string, pattern: RegExp): CommandSignature =>
  ({ name, test: (command) => pattern.test(command) });

// ── Signatures ──────────────────────────────────────────────────────────

export const DANGEROUS_SIGNATURES: readonly CommandSignature[] = [
  { name: 'recursive forced deletion', test: isRecursiveForcedDelete },
  regex('raw disk write with dd', /\bdd\b[^|;&]*\bof=\/dev\/(?!null\b|zero\b|stdout\b|stderr\b)/),
  regex('filesystem creation', /\bmkfs(\.\w+)?\b/),
  regex('partition or wipe tool', /\b(fdisk|sfdisk|cfdisk|parted|wipefs|shred)\b/),
  regex('redirection onto a raw disk', />\s*\/dev\/(sd[a-z]|nvme\d|hd[a-z]|vd[a-z]|xvd[a-z]|mmcblk\d)/),
  regex('fork bomb', /:\s*\(\s*\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/),
  regex('self-replicating function', /\b(\w+)\s*\(\s*\)\s*\{\s*\1\s*\|\s*\1\s*&\s*\}/),
  regex('recursive permission change on /', /\b(chmod|chown|chgrp)\s+(-\S*R\S*|--recursive)\s+(\S+\s+)?\/(\s|$|\*)/),
  regex('deleting find from /', /\bfind\s+\/(\s|$)[^|;&]*-delete\b/),
  regex('downloaded script piped into a shell', /\b(curl|wget)\b[^|;&]*\|\s*(sudo\s+)?(ba|z|k|da)?sh\b/),
  regex('power state change', /(^|[;&|]\s*|\bsudo\s+)(shutdown|reboot|halt|poweroff|init\s+[06])\b/),
  regex('hard git reset', /\bgit\s+reset\s+--hard\b/),
  regex('forced git clean', /\bgit\s+clean\s+-\S*f/),
  regex('crontab removal', /\bcrontab\s+(-\S*\s+)*-r\b/),
  regex('overwriting system account files', />\s*\/etc\/(passwd|shadow|sudoers|group)\b/),
];

export const CAUTION_SIGNATURES: readonly CommandSignature[] = [
  regex('privilege escalation', /(^|[;&|]\s*)(sudo|su|doas|pkexec)\b/),
  regex('permission or ownership change', /\b(chmod|chown|chgrp|setfacl)\b/),
  regex('file deletion', /(^|[;&|]\s*|\bsudo\s+)(rm|rmdir|unlink)\b/),
  regex('find with deletion', /\bfind\b[^|;&]*(-delete|-exec\s+rm)\b/),
  regex('write into a system directory', /\b(mv|cp|install|ln|tee)\b[^|;&]*\s\/(etc|usr|bin|sbin|boot|lib|lib64|var\/lib)\//),
  regex('redirection into /etc', />\s*\/etc\//),
  regex('service control', /\b(systemctl|service)\b[^|;&]*\b(stop|disable|mask|restart|kill)\b/),
  regex('process termination', /\b(kill|pkill|killall)\b/),
  regex('package removal', /\b(apt|apt-get|yum|dnf|zypper|pacman|apk|brew|snap)\b[^|;&]*(\b(remove|purge|erase|uninstall|autoremove)\b|\s-R)/),
  regex('language package removal', /\b(pip3?|npm|gem|cargo)\s+(uninstall|remove)\b/),
  regex('account management', /\b(useradd|userdel|usermod|groupadd|groupdel|passwd|chpasswd|visudo)\b/),
  regex('mount change', /\b(mount|umount|swapoff|swapon)\b/),
  regex('firewall change', /\b(iptables|ip6tables|nft|ufw|firewall-cmd)\b/),
  regex('scheduled task change', /\bcrontab\b/),
  regex('database drop', /\bdrop\s+(database|table|schema)\b/i),
];

// ── Security Gate ───────────────────────────────────────────────────────

/**
 * Classifies shell commands by risk. Classification is pure: it depends only
 * on the command string and the policy fixed at construction time.
 */
export class SecurityGate {
  private readonly dangerous: readonly CommandSignature[];
  private readonly caution: readonly CommandSignature[];
  private readonly killSwitch: boolean;

  constructor(policy: SecurityPolicy = {}) {
    this.killSwitch = policy.killSwitch ?? false;
    this.dangerous = [...DANGEROUS_SIGNATURES, ...compile(policy.dangerousPatterns ?? [], 'configured dangerous pattern')];
    this.caution = [...CAUTION_SIGNATURES, ...compile(policy.cautionPatterns ?? [], 'configured caution pattern')];
  }

  classify(command: string): SecurityVerdict {
    if (this.killSwitch) {
      return { tier: 'blocked', rationale: 'Command execution is disabled by the kill switch' };
    }

    const normalized = command.trim();
    if (!normalized) {
      return { tier: 'caution', rationale: 'Empty command' };
    }

    const dangerous = this.dangerous.find((s) => s.test(normalized));
    if (dangerous) {
      return { tier: 'dangerous', rationale: `Matches destructive signature: ${dangerous.name}`, pattern: dangerous.name };
    }

    const caution = this.caution.find((s) => s.test(normalized));
    if (caution) {
      return { tier: 'caution', rationale: `Matches sensitive signature: ${caution.name}`, pattern: caution.name };
    }

    return { tier: 'safe', rationale: 'No risky signature matched' };
  }

  /** Map a verdict to what the dispatcher must do in the given mode */
  decide(verdict: SecurityVerdict, mode: ExecutionMode): GateDecision {
    if (verdict.tier === 'blocked') return 'reject';
    if (mode === 'confirm-each') return 'confirm';
    return verdict.tier === 'dangerous' ? 'confirm' : 'allow';
  }

  isKillSwitchEnabled(): boolean {
    return this.killSwitch;
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────

function compile(patterns: string[], label: string): CommandSignature[] {
  return patterns.map((source) => regex(`${label} /${source}/`, new RegExp(source, 'i')));
}

/** Split a command line into simple commands on ; && || | and newlines */
export function splitCommands(command: string): string[] {
  return command
    .split(/\|\||&&|[;|\n]/)
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Detects `rm` invoked with both recursive and force flags in any spelling
 * (`-rf`, `-fr`, `-r -f`, `-Rf`, `--recursive --force`), optionally behind
 * sudo/env/xargs wrappers.
 */
export function isRecursiveForcedDelete(command: string): boolean {
  return splitCommands(command).some((part) => {
    const tokens = part.split(/\s+/);
    const rmAt = tokens.findIndex((t) => t === 'rm' || t.endsWith('/rm'));
    if (rmAt < 0) return false;

    let recursive = false;
    let force = false;
    for (const token of tokens.slice(rmAt + 1)) {
      if (token === '--') break;
      if (token === '--recursive') recursive = true;
      else if (token === '--force') force = true;
      else if (/^-[a-zA-Z]+$/.test(token)) {
        if (/[rR]/.test(token)) recursive = true;
        if (token.includes('f')) force = true;
      }
    }
    return recursive && force;
  });
}
