/**
 * 仓库键归一化 — 同一仓库的 https / ssh / scp 形式地址映射为同一个键
 *   https://GitHub.com/Acme/Svc-A.git      -> github.com/acme/svc-a
 *   git@gitlab.example.com:group/app.git   -> gitlab.example.com/group/app
 */

export function normalizeRepoKey(url: string): string {
  let key = url.trim().toLowerCase();

  // scp 风格: user@host:path（不含 scheme）
  const scp = key.match(/^(?:[^@/]+@)?([^:/]+):(?!\d+\/)(.+)$/);
  if (scp && !key.includes("://")) {
    key = `${scp[1]}/${scp[2]}`;
  } else {
    key = key
      .replace(/^[a-z][a-z0-9+.-]*:\/\//, "")
      .replace(/^[^@/]+@/, "")
      .replace(/^([^/:]+):\d+(?=\/|$)/, "$1");
  }

  return key
    .replace(/\/+$/, "")
    .replace(/\.git$/, "")
    .replace(/\/{2,}/g, "/");
}
