import type { NetworkSpec, VMSpec } from "../lib/lab-spec.ts";

export const QEMU_EMULATOR = "/usr/bin/qemu-system-x86_64";

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "'": "&apos;",
  '"': "&quot;",
};

export function escapeXml(value: string | number): string {
  return String(value).replace(/[&<>'"]/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

function pcieRootPorts(count: number): string {
  const ports: string[] = [];
  for (let index = 1; index <= count; index++) {
    const fn = index - 1;
    const multifunction = index === 1 ? " multifunction='on'" : "";
    ports.push(`    <controller type='pci' index='${index}' model='pcie-root-port'>
      <model name='pcie-root-port'/>
      <target chassis='${index}' port='0x${(0x0f + index).toString(16)}'/>
      <address type='pci' domain='0x0000' bus='0x00' slot='0x02' function='0x${fn}'${multifunction}/>
    </controller>`);
  }
  return ports.join("\n");
}

/** q35/UEFI KVM guest on the lab network, disk = the VM's overlay. */
export function renderDomain(vm: VMSpec): string {
  const x = escapeXml;
  return `<domain type='kvm'>
  <name>${x(vm.name)}</name>
  <uuid>${x(vm.uuid)}</uuid>
  <memory unit='MiB'>${x(vm.memoryMB)}</memory>
  <currentMemory unit='MiB'>${x(vm.memoryMB)}</currentMemory>
  <vcpu placement='static'>${x(vm.vcpuCount)}</vcpu>
  <os firmware='efi'>
    <type arch='x86_64' machine='q35'>hvm</type>
    <boot dev='hd'/>
  </os>
  <features>
    <acpi/>
    <apic/>
    <vmport state='off'/>
  </features>
  <cpu mode='host-passthrough' check='none' migratable='on'/>
  <clock offset='utc'>
    <timer name='rtc' tickpolicy='catchup'/>
    <timer name='pit' tickpolicy='delay'/>
    <timer name='hpet' present='no'/>
  </clock>
  <on_poweroff>destroy</on_poweroff>
  <on_reboot>restart</on_reboot>
  <on_crash>destroy</on_crash>
  <pm>
    <suspend-to-mem enabled='no'/>
    <suspend-to-disk enabled='no'/>
  </pm>
  <devices>
    <emulator>${QEMU_EMULATOR}</emulator>
    <disk type='file' device='disk'>
      <driver name='qemu' type='qcow2' discard='unmap'/>
      <source file='${x(vm.overlayPath)}'/>
      <target dev='vda' bus='virtio'/>
      <address type='pci' domain='0x0000' bus='0x04' slot='0x00' function='0x0'/>
    </disk>
    <controller type='usb' index='0' model='qemu-xhci' ports='15'>
      <address type='pci' domain='0x0000' bus='0x02' slot='0x00' function='0x0'/>
    </controller>
    <controller type='pci' index='0' model='pcie-root'/>
${pcieRootPorts(6)}
    <controller type='sata' index='0'>
      <address type='pci' domain='0x0000' bus='0x00' slot='0x1f' function='0x2'/>
    </controller>
    <controller type='virtio-serial' index='0'>
      <address type='pci' domain='0x0000' bus='0x03' slot='0x00' function='0x0'/>
    </controller>
    <interface type='network'>
      <mac address='${x(vm.macAddress)}'/>
      <source network='${x(vm.networkName)}'/>
      <model type='virtio'/>
      <address type='pci' domain='0x0000' bus='0x01' slot='0x00' function='0x0'/>
    </interface>
    <serial type='pty'>
      <target type='isa-serial' port='0'>
        <model name='isa-serial'/>
      </target>
    </serial>
    <console type='pty'>
      <target type='serial' port='0'/>
    </console>
    <channel type='unix'>
      <target type='virtio' name='org.qemu.guest_agent.0'/>
      <address type='virtio-serial' controller='0' bus='0' port='1'/>
    </channel>
    <channel type='spicevmc'>
      <target type='virtio' name='com.redhat.spice.0'/>
      <address type='virtio-serial' controller='0' bus='0' port='2'/>
    </channel>
    <input type='tablet' bus='usb'>
      <address type='usb' bus='0' port='1'/>
    </input>
    <input type='mouse' bus='ps2'/>
    <input type='keyboard' bus='ps2'/>
    <tpm model='tpm-crb'>
      <backend type='emulator' version='2.0'/>
    </tpm>
    <graphics type='spice' autoport='yes'>
      <listen type='address'/>
      <image compression='auto_glz'/>
      <gl enable='no'/>
    </graphics>
    <video>
      <model type='qxl' ram='65536' vram='65536' vgamem='16384' heads='1' primary='yes'/>
      <address type='pci' domain='0x0000' bus='0x00' slot='0x01' function='0x0'/>
    </video>
    <watchdog model='itco' action='reset'/>
    <memballoon model='virtio'>
      <address type='pci' domain='0x0000' bus='0x05' slot='0x00' function='0x0'/>
    </memballoon>
    <rng model='virtio'>
      <backend model='random'>/dev/urandom</backend>
      <address type='pci' domain='0x0000' bus='0x06' slot='0x00' function='0x0'/>
    </rng>
  </devices>
</domain>
`;
}

/** NAT network with DNS names and static DHCP hosts for every reservation. */
export function renderNetwork(network: NetworkSpec): string {
  const x = escapeXml;
  const dnsHosts = network.reservations
    .map(
      (r) => `    <host ip='${x(r.ip)}'>
      <hostname>${x(r.hostname)}</hostname>
      <hostname>${x(r.fqdn)}</hostname>
    </host>`,
    )
    .join("\n");
  const dhcpHosts = network.reservations
    .map((r) => `      <host mac='${x(r.mac)}' name='${x(r.fqdn)}' ip='${x(r.ip)}'/>`)
    .join("\n");

  return `<network>
  <name>${x(network.name)}</name>
  <forward mode='nat'>
    <nat>
      <port start='1024' end='65535'/>
    </nat>
  </forward>
  <bridge name='${x(network.bridge)}' stp='on' delay='0'/>
  <domain name='${x(network.domainSuffix)}' localOnly='yes'/>
  <dns>
${dnsHosts}
  </dns>
  <ip address='${x(network.gateway)}' netmask='${x(network.netmask)}'>
    <dhcp>
      <range start='${x(network.dhcpRange.start)}' end='${x(network.dhcpRange.end)}'/>
${dhcpHosts}
    </dhcp>
  </ip>
</network>
`;
}
