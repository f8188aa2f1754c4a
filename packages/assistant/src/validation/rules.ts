/** Word lists the command validator matches against. */

export const PROTECTED_ROOTS: ReadonlySet<string> = new Set([
  '/', '/*', '~', '~/', '~/*', '$HOME', '${HOME}', '$HOME/*', '/home', '/home/*',
  '/bin', '/boot', '/dev', '/etc', '/lib', '/lib64', '/opt', '/proc', '/root',
  '/sbin', '/srv', '/sys', '/usr', '/var',
]);

export const CRITICAL_FILES: ReadonlySet<string> = new Set([
  '/etc/passwd', '/etc/shadow', '/etc/group', '/etc/gshadow', '/etc/sudoers', '/etc/fstab',
]);

export const PRIVILEGED_PREFIXES: ReadonlyArray<string> = [
  '/etc', '/usr', '/boot', '/opt', '/var', '/lib', '/bin', '/sbin', '/srv',
];

export const BLOCK_DEVICE = /^\/dev\/(sd[a-z]|hd[a-z]|vd[a-z]|xvd[a-z]|nvme\d|mmcblk\d|dm-\d|md\d|loop\d|disk\/)/;

export const FILESYSTEM_WRECKERS: ReadonlySet<string> = new Set([
  'wipefs', 'mkswap', 'blkdiscard', 'pvcreate', 'vgcreate', 'lvcreate', 'pvremove', 'vgremove', 'lvremove',
]);

/** cryptsetup actions that overwrite or erase LUKS headers. */
export const CRYPTSETUP_WIPING_ACTIONS: ReadonlySet<string> = new Set(['luksFormat', 'erase', 'luksErase']);

/** find actions that delete, run commands or write files. */
export const FIND_ACTIONS: ReadonlySet<string> = new Set([
  '-delete', '-exec', '-execdir', '-ok', '-okdir', '-fprint', '-fprint0', '-fprintf', '-fls',
]);

export const FIND_EXEC_ACTIONS: ReadonlySet<string> = new Set(['-exec', '-execdir', '-ok', '-okdir']);

export const PARTITIONERS: ReadonlySet<string> = new Set(['fdisk', 'sfdisk', 'sgdisk', 'parted', 'cfdisk', 'gdisk']);

export const POWER_COMMANDS: ReadonlySet<string> = new Set(['shutdown', 'reboot', 'poweroff', 'halt']);

export const POWER_SYSTEMCTL_VERBS: ReadonlySet<string> = new Set([
  'poweroff', 'reboot', 'halt', 'kexec', 'suspend', 'hibernate', 'soft-reboot',
]);

/** Units whose loss leaves the desktop unbootable or unreachable. */
export const CORE_SERVICES: ReadonlySet<string> = new Set([
  'dbus', 'systemd-journald', 'systemd-logind', 'systemd-udevd', 'systemd-networkd',
  'systemd-resolved', 'NetworkManager', 'polkit', 'display-manager', 'sddm', 'gdm', 'lightdm',
]);

export const SERVICE_CONTROL_VERBS: ReadonlySet<string> = new Set([
  'start', 'stop', 'restart', 'reload', 'try-restart', 'reload-or-restart', 'enable', 'disable', 'mask', 'unmask',
]);

export const SERVICE_DISABLING_VERBS: ReadonlySet<string> = new Set(['stop', 'disable', 'mask', 'kill']);

export const SHELLS: ReadonlySet<string> = new Set(['sh', 'bash', 'zsh', 'dash', 'ksh', 'fish']);

export const ACCOUNT_COMMANDS: ReadonlySet<string> = new Set([
  'useradd', 'userdel', 'usermod', 'groupadd', 'groupdel', 'groupmod', 'passwd', 'chsh', 'chfn', 'gpasswd', 'chpasswd',
]);

/** Subcommands that change installed packages, per package manager. */
export const PACKAGE_MUTATIONS: Readonly<Record<string, ReadonlySet<string>>> = {
  apt: new Set(['install', 'reinstall', 'remove', 'purge', 'autoremove', 'upgrade', 'full-upgrade', 'dist-upgrade', 'update']),
  'apt-get': new Set(['install', 'reinstall', 'remove', 'purge', 'autoremove', 'upgrade', 'dist-upgrade', 'update']),
  dnf: new Set(['install', 'reinstall', 'remove', 'erase', 'upgrade', 'update', 'autoremove', 'downgrade', 'distro-sync']),
  zypper: new Set(['in', 'install', 'rm', 'remove', 'up', 'update', 'dup', 'dist-upgrade', 'patch']),
  snap: new Set(['install', 'remove', 'refresh', 'revert']),
  flatpak: new Set(['install', 'uninstall', 'update', 'remove']),
};

/** pacman and its AUR helpers take an operation flag instead of a subcommand. */
export const PACMAN_LIKE: ReadonlySet<string> = new Set(['pacman', 'yay', 'paru']);

/** File-mutating commands; for the copy family only the destination counts. */
export const WRITING_COMMANDS: ReadonlySet<string> = new Set(['rm', 'mv', 'chmod', 'chown', 'chgrp', 'rmdir', 'truncate']);
export const COPYING_COMMANDS: ReadonlySet<string> = new Set(['cp', 'ln', 'install', 'rsync']);

/** Read-only commands, reported as advisory information only. */
export const READ_ONLY_COMMANDS: ReadonlySet<string> = new Set([
  'ls', 'cat', 'head', 'tail', 'less', 'grep', 'find', 'ps', 'top', 'htop', 'df', 'du', 'free', 'uname',
  'uptime', 'whoami', 'id', 'lsblk', 'lscpu', 'lsusb', 'lspci', 'ip', 'hostname', 'hostnamectl', 'date',
  'which', 'echo', 'wc', 'sort', 'journalctl', 'fastfetch', 'neofetch', 'sensors', 'pwd', 'stat', 'file',
  'printenv', 'who', 'w', 'ss', 'nproc', 'vmstat', 'iostat', 'dmesg', 'timedatectl', 'locale',
]);
