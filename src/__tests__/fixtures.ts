/**
 * Shared test data: a small pci.ids file and matching udevadm output.
 */

export const SAMPLE_PCI_IDS = [
  "#",
  "#\tList of PCI ID's (test copy)",
  "#",
  "",
  "0010  Vendor X",
  "\t0020  Model Y",
  "\t\t0030 0040  Sub Z",
  "1a2b  Acme Silicon",
  "\t3c4d  Acme Bridge",
  "\t\t1a2b 0001  Acme Bridge Rev A",
  "\t\t0010 0002  OEM Bridge",
  "\t5e6f  Acme NIC",
  "ffff  Illegal Vendor ID",
  "",
  "C 00  Unclassified device",
  "\t00  Non-VGA unclassified device",
  "",
].join("\n");

export const BRIDGE_SYSPATH = "/sys/devices/pci0000:00/0000:00:1f.0";
export const NIC_SYSPATH = "/sys/devices/pci0000:00/0000:00:19.0";

export const BRIDGE_PROPERTIES = [
  "DEVPATH=/devices/pci0000:00/0000:00:1f.0",
  "DRIVER=acme_bridge",
  "PCI_CLASS=60100",
  "PCI_ID=1A2B:3C4D",
  "PCI_SUBSYS_ID=0010:0002",
  "PCI_SLOT_NAME=0000:00:1f.0",
  "MODALIAS=pci:v00001A2Bd00003C4Dsv00000010sd00000002bc06sc01i00",
  "SUBSYSTEM=pci",
  "ID_PCI_CLASS_FROM_DATABASE=Bridge",
  "ID_VENDOR_FROM_DATABASE=udev vendor",
  "ID_MODEL_FROM_DATABASE=udev bridge",
].join("\n");

export const NIC_PROPERTIES = [
  "DEVPATH=/devices/pci0000:00/0000:00:19.0",
  "PCI_ID=1A2B:5E6F",
  "PCI_SUBSYS_ID=1A2B:9999",
  "PCI_SLOT_NAME=0000:00:19.0",
  "SUBSYSTEM=pci",
  "ID_PCI_CLASS_FROM_DATABASE=Network controller",
].join("\n");
