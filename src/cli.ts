import { writeFileSync } from 'fs';
import { availableParallelism } from 'os';
import { renderParallel } from './render';
import { DEFAULT_RENDER_SETTINGS, fieldParams } from './settings';
import { exportToPPM } from './ppmexporter';

const USAGE = `Usage: tsx src/cli.ts [output.ppm] [options]

Options:
  --width <px>        Image width (default ${DEFAULT_RENDER_SETTINGS.width})
  --height <px>       Image height (default ${DEFAULT_RENDER_SETTINGS.height})
  --fov <degrees>     Vertical field of view (default 60)
  --workers <count>   Worker threads, 0 renders inline (default: available cores)
  --radius <r>        Sphere radius (default 1.5)
  --amplitude <a>     Displacement amplitude (default 1)
  --help              Show this message`;

interface CliOptions {
  output: string;
  width: number;
  height: number;
  fovDegrees: number;
  workers: number;
  radius?: number;
  amplitude?: number;
}

function parseArgs(argv: string[]): CliOptions | null {
  const options: CliOptions = {
    output: 'out.ppm',
    width: DEFAULT_RENDER_SETTINGS.width,
    height: DEFAULT_RENDER_SETTINGS.height,
    fovDegrees: (DEFAULT_RENDER_SETTINGS.fov * 180) / Math.PI,
    workers: availableParallelism(),
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') return null;
    if (!arg.startsWith('--')) {
      options.output = arg;
      continue;
    }

    const raw = argv[++i];
    if (raw === undefined) {
      throw new Error(`Missing value for ${arg}`);
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new Error(`Expected a number for ${arg}, got "${raw}"`);
    }

    switch (arg) {
      case '--width':
        options.width = value;
        break;
      case '--height':
        options.height = value;
        break;
      case '--fov':
        options.fovDegrees = value;
        break;
      case '--workers':
        options.workers = value;
        break;
      case '--radius':
        options.radius = value;
        break;
      case '--amplitude':
        options.amplitude = value;
        break;
      default:
        throw new Error(`Unknown option ${arg}`);
    }
  }
  return options;
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    console.log(USAGE);
    return;
  }

  const { width, height, workers, output } = options;
  const field = fieldParams({ radius: options.radius, amplitude: options.amplitude });
  const fov = (options.fovDegrees * Math.PI) / 180;

  console.log(`[cli] Rendering ${width}x${height} with ${workers} worker(s)`);
  const start = performance.now();
  const pixels = await renderParallel(width, height, fov, { field, workers });
  console.log(`[cli] Rendered in ${(performance.now() - start).toFixed(0)} ms`);

  writeFileSync(output, exportToPPM(pixels, width, height, { comment: 'sphere-trace' }));
  console.log(`[cli] Wrote ${output}`);
}

main().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
