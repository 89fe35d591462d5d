export const Paths = {
    ignition: "/root/config.ign",
    k3sConfigDir: "/etc/rancher/k3s",
    k3sConfig: "/etc/rancher/k3s/config.yaml",
    postInstall: "/var/post_install",
    appliedMarker: "/var/post_install/.applied",
    secrets: "/root/secrets",
};

export type K3sExec = "server" | "agent";

export const Commands = {
    isMicroOS(): string {
        return `grep -q '^ID="opensuse-microos"' /etc/os-release`;
    },

    // Runs in the rescue system: writes the MicroOS image to the disk and stages the ignition config.
    installImage(imageUrl: string): string {
        return `set -ex
cd /root
apt-get install -y aria2
aria2c --follow-metalink=mem ${imageUrl}
qemu-img convert -p -f qcow2 -O host_device $(ls -a | grep -ie '^opensuse.*microos.*qcow2$') /dev/sda
sgdisk -e /dev/sda
parted -s /dev/sda resizepart 4 99%
parted -s /dev/sda mkpart primary ext2 99% 100%
partprobe /dev/sda && udevadm settle && fdisk -l /dev/sda
mount /dev/sda4 /mnt/ && btrfs filesystem resize max /mnt && umount /mnt
mke2fs -L ignition /dev/sda5
mount /dev/sda5 /mnt
mkdir -p /mnt/ignition
cp ${Paths.ignition} /mnt/ignition/config.ign
umount /mnt`;
    },

    // Detached so the SSH session closes cleanly before the host goes down.
    reboot(): string {
        return "(sleep 2; reboot)&";
    },

    readFile(path: string): string {
        return `cat ${path} 2>/dev/null || true`;
    },

    makeDir(path: string): string {
        return `mkdir -p ${path}`;
    },

    removeFile(path: string): string {
        return `rm -f ${path}`;
    },

    installK3s(channel: string, exec: K3sExec): string[] {
        return [
            `curl -sfL https://get.k3s.io | INSTALL_K3S_SKIP_START=true INSTALL_K3S_SKIP_SELINUX_RPM=true INSTALL_K3S_CHANNEL=${channel} INSTALL_K3S_EXEC=${exec} sh -`,
            "/sbin/restorecon -v /usr/local/bin/k3s",
        ];
    },

    startK3s(exec: K3sExec): string {
        return exec === "server" ? "systemctl start k3s" : "systemctl start k3s-agent";
    },

    readyz(): string {
        return "kubectl get --raw='/readyz'";
    },

    nodeReadyStatus(nodeName: string): string {
        return `kubectl get node ${nodeName} -o jsonpath='{.status.conditions[?(@.type=="Ready")].status}'`;
    },

    getSecretData(namespace: string, name: string): string {
        return `kubectl -n ${namespace} get secret ${name} --ignore-not-found -o jsonpath='{.data}'`;
    },

    createFromFile(path: string): string {
        return `kubectl create -f ${path}`;
    },

    patchSecret(namespace: string, name: string, patchFile: string): string {
        return `kubectl -n ${namespace} patch secret ${name} --type merge --patch-file ${patchFile}`;
    },

    applyKustomization(dir: string): string {
        return `kubectl apply -k ${dir}`;
    },
};
