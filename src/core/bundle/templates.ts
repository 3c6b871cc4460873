/**
 * Files written into a bundle build context
 */

export const FALLBACK_RESTORE_SCRIPT = `#!/bin/sh
# Restores the named volumes of a homestash backup.
set -eu

BACKUP="\${1:-}"
if [ -z "$BACKUP" ] || [ ! -d "$BACKUP" ]; then
  echo "Usage: $0 /path/to/backup"
  exit 1
fi

VOL_DIR="$BACKUP/volumes"
if [ ! -d "$VOL_DIR" ]; then
  echo "No volumes directory in $BACKUP"
  exit 1
fi

echo "==> Restoring volumes"
for archive in "$VOL_DIR"/*.tar.gz; do
  [ -e "$archive" ] || continue
  volume="$(basename "$archive" .tar.gz)"
  echo "  -> $volume"
  docker volume create "$volume" >/dev/null
  docker run --rm -v "$volume:/target" -v "$VOL_DIR:/backup" alpine:latest \\
    tar -xzf "/backup/$volume.tar.gz" -C /target
done

docker network inspect proxy >/dev/null 2>&1 || docker network create proxy

echo "Compose files are in $BACKUP/compose-files; copy them out and run: docker compose up -d"
`;

export function extractionCommands(imageTag: string): string[] {
  return [
    `docker create --name homelab-bundle ${imageTag}`,
    "docker cp homelab-bundle:/bundle ./bundle",
    "docker rm homelab-bundle",
  ];
}

export function renderReadme(imageTag: string): string {
  const extract = extractionCommands(imageTag)
    .map((line) => `  ${line}`)
    .join("\n");

  return `This image contains a homelab backup and the tool to restore it.

To extract on any host:
${extract}

Then restore (as root):
  sudo ./bundle/homelab-restore.sh ./bundle/backup

Contents of /bundle:
  backup/              volumes, bind-mount archives, compose files, manifests, images.tar (if present)
  homelab-restore.sh
  README.txt

This image likely contains secrets and configuration. Keep it private.
`;
}

export function renderDockerfile(baseImage: string, imageTag: string, created: Date): string {
  const instructions = extractionCommands(imageTag).join(" && ");

  return `FROM ${baseImage}
LABEL org.opencontainers.image.title="Homelab Backup" \\
      org.opencontainers.image.description="Docker volumes, configs, compose files and saved images" \\
      org.opencontainers.image.created="${created.toISOString()}" \\
      org.opencontainers.image.source="local"
COPY bundle /bundle
# Data image: extract /bundle with docker cp (see README.txt)
CMD ["sh", "-c", "echo 'Backup image ready. To extract: ${instructions}'"]
`;
}
