import {
  analyzeBlockDevices,
  analyzeBootDisk,
  analyzeMachineDisks,
  categorizeMachine,
  DiskCategory,
  formatSize,
  meetsDiskRequirements
} from '../../src/audit/disk/disk-analyzer';
import { machine, rawDisk, TB } from './fixtures';

describe('disk analysis', () => {
  describe('formatSize', () => {
    it('should show binary and decimal terabytes', () => {
      expect(formatSize(2 * TB)).toBe('1.82 TiB (2.00 TB)');
      expect(formatSize(500_000_000_000)).toBe('0.45 TiB (0.50 TB)');
      expect(formatSize(0)).toBe('0.00 TiB (0.00 TB)');
    });
  });

  describe('analyzeBootDisk', () => {
    it('should describe a large SSD boot disk', () => {
      const result = analyzeBootDisk(machine('node-1', rawDisk(1, 'sda', 2 * TB)), TB);

      expect(result).toEqual({
        id: 1,
        size: 2 * TB,
        isSsd: true,
        isLargeSsd: true,
        info: 'sda - 1.82 TiB (2.00 TB) (ssd)'
      });
    });

    it('should treat the threshold as inclusive', () => {
      const result = analyzeBootDisk(machine('node-1', rawDisk(1, 'sda', TB)), TB);
      expect(result.isLargeSsd).toBe(true);
    });

    it('should not count a large rotary disk', () => {
      const result = analyzeBootDisk(machine('node-1', rawDisk(1, 'sda', 4 * TB, ['rotary'])), TB);

      expect(result.isSsd).toBe(false);
      expect(result.isLargeSsd).toBe(false);
      expect(result.info).toBe('sda - 3.64 TiB (4.00 TB) (not ssd)');
    });

    it('should report a missing boot disk', () => {
      const result = analyzeBootDisk(machine('node-1', null), TB);

      expect(result).toEqual({
        id: null,
        size: 0,
        isSsd: false,
        isLargeSsd: false,
        info: 'No boot disk information available'
      });
    });

    it('should fall back to "unknown" for an unnamed boot disk', () => {
      const m = machine('node-1', null, [], {
        boot_disk: { id: 7, size: 2 * TB, tags: ['ssd'] }
      });
      expect(analyzeBootDisk(m, TB).info).toBe('unknown - 1.82 TiB (2.00 TB) (ssd)');
    });
  });

  describe('analyzeBlockDevices', () => {
    it('should skip the boot disk when counting', () => {
      const m = machine('node-1', rawDisk(1, 'sda', 2 * TB), [rawDisk(2, 'sdb', 2 * TB)]);
      const result = analyzeBlockDevices(m, 1, TB);

      expect(result.additionalLargeSsds).toBe(1);
      expect(result.hasSmallNonBootSsd).toBe(false);
      expect(result.deviceInfo).toEqual([
        'sda: 1.82 TiB (2.00 TB) (ssd)',
        'sdb: 1.82 TiB (2.00 TB) (ssd)'
      ]);
    });

    it('should flag a small non-boot SSD', () => {
      const m = machine('node-1', rawDisk(1, 'sda', 2 * TB), [rawDisk(2, 'sdb', 480_000_000_000)]);
      const result = analyzeBlockDevices(m, 1, TB);

      expect(result.additionalLargeSsds).toBe(0);
      expect(result.hasSmallNonBootSsd).toBe(true);
    });

    it('should label rotary, unknown and unnamed devices', () => {
      const m = machine('node-1', null, [], {
        blockdevice_set: [
          { id: 3, name: 'sdc', size: 4 * TB, tags: ['rotary'] },
          { id: 4, size: 0, tags: [] }
        ]
      });
      const result = analyzeBlockDevices(m, null, TB);

      expect(result.deviceInfo).toEqual([
        'sdc: 3.64 TiB (4.00 TB) (rotary)',
        'unnamed: 0.00 TiB (0.00 TB) (unknown)'
      ]);
      expect(result.additionalLargeSsds).toBe(0);
    });

    it('should return nothing when the machine has no block device list', () => {
      const m = machine('node-1', rawDisk(1, 'sda', 2 * TB), [], { blockdevice_set: undefined });
      expect(analyzeBlockDevices(m, 1, TB)).toEqual({
        additionalLargeSsds: 0,
        hasSmallNonBootSsd: false,
        deviceInfo: []
      });
    });
  });

  describe('categorizeMachine', () => {
    const categorize = (...args: Parameters<typeof machine>) => analyzeMachineDisks(machine(...args), TB).category;

    it('should need no change with two large SSDs', () => {
      expect(categorize('a', rawDisk(1, 'sda', 2 * TB), [rawDisk(2, 'sdb', 2 * TB)])).toBe(DiskCategory.NO_CHANGE_NEEDED);
    });

    it('should add a second disk when a 2TB SSD boot disk stands alone', () => {
      expect(categorize('a', rawDisk(1, 'sda', 2 * TB))).toBe(DiskCategory.NEED_SECOND_DISK_ADDITION);
    });

    it('should replace the boot disk when only the second disk is large', () => {
      expect(categorize('a', rawDisk(1, 'sda', 500_000_000_000), [rawDisk(2, 'sdb', 2 * TB)])).toBe(
        DiskCategory.NEED_BOOT_DISK_REPLACEMENT
      );
    });

    it('should replace the second disk when it is a small SSD', () => {
      expect(categorize('a', rawDisk(1, 'sda', 2 * TB), [rawDisk(2, 'sdb', 240_000_000_000)])).toBe(
        DiskCategory.NEED_SECOND_DISK_REPLACEMENT
      );
    });

    it('should add a second disk when the other disk is rotary', () => {
      expect(categorize('a', rawDisk(1, 'sda', 2 * TB), [rawDisk(2, 'sdb', 8 * TB, ['rotary'])])).toBe(
        DiskCategory.NEED_SECOND_DISK_ADDITION
      );
    });

    it('should need both disks when neither requirement is met', () => {
      expect(categorize('a', rawDisk(1, 'sda', 2 * TB, ['rotary']), [rawDisk(2, 'sdb', 500_000_000_000)])).toBe(
        DiskCategory.NEED_BOTH_BOOT_AND_SECOND_DISK
      );
    });

    it('should count every large SSD when the boot disk is unknown', () => {
      expect(categorize('a', null, [rawDisk(3, 'nvme0n1', 2 * TB)])).toBe(DiskCategory.NEED_BOOT_DISK_REPLACEMENT);
    });

    it('should agree with meetsDiskRequirements', () => {
      const bootDisk = { id: 1, size: 2 * TB, isSsd: true, isLargeSsd: true, info: '' };
      const devices = { additionalLargeSsds: 2, hasSmallNonBootSsd: true, deviceInfo: [] };

      expect(categorizeMachine(bootDisk, devices)).toBe(DiskCategory.NO_CHANGE_NEEDED);
      expect(meetsDiskRequirements(bootDisk, devices)).toBe(true);
    });
  });
});
