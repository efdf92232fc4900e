import { parseArgs } from 'node:util';
import { DEFAULT_THETAS, DT_LIST_CONFIG, PARAMETER_CONFIGS, THETA_LIST_CONFIG } from './constants';
import { InvalidParameterError } from './errors';
import { createLogger } from './logger';
import { compare, convergenceRates, errorTable } from './services/experimentRunner';
import { parseNumberList, parseParameterInputs } from './services/parameterInput';
import { formatConvergence, formatErrorTable } from './services/report';

const log = createLogger('decay-solver');

export const USAGE = `Usage: decay-solver [options]

Solves u' = -a*u, u(0) = I with the theta-method and compares schemes against the exact solution.

Options:
  --I <value>             initial value (default 1)
  --a <value>             decay rate (default 2; write --a=-1 for negative values)
  --T <value>             time horizon (default 4)
  --dt <value>            time step (default 0.4)
  --thetas <list>         comma-separated scheme weights in [0, 1] (default 0,1,0.5)
  --convergence <list>    comma-separated time steps for observed convergence rates
  -h, --help              show this message`;

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      I: { type: 'string' },
      a: { type: 'string' },
      T: { type: 'string' },
      dt: { type: 'string' },
      thetas: { type: 'string' },
      convergence: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

/** Runs the CLI against `argv` (without node and script path) and returns the exit code. */
export const run = (argv: string[], out: (text: string) => void = console.log): number => {
  let values: ReturnType<typeof parseCliArgs>['values'];
  try {
    values = parseCliArgs(argv).values;
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    out(USAGE);
    return 1;
  }

  if (values.help) {
    out(USAGE);
    return 0;
  }

  const parsed = parseParameterInputs({ I: values.I, a: values.a, T: values.T, dt: values.dt });
  if (!parsed.ok) {
    for (const config of PARAMETER_CONFIGS) {
      const fieldError = parsed.errors[config.id];
      if (fieldError) log.error(`${config.label} (--${config.id}): ${fieldError}`);
    }
    return 1;
  }
  const { I, a, T, dt } = parsed.params;

  let thetas = DEFAULT_THETAS;
  if (values.thetas !== undefined) {
    const thetaList = parseNumberList(values.thetas, THETA_LIST_CONFIG);
    if (!thetaList.ok) {
      log.error(thetaList.error);
      return 1;
    }
    thetas = thetaList.values;
  }

  let dts: number[] | undefined;
  if (values.convergence !== undefined) {
    const dtList = parseNumberList(values.convergence, DT_LIST_CONFIG);
    if (!dtList.ok) {
      log.error(dtList.error);
      return 1;
    }
    dts = dtList.values;
  }

  try {
    const dataset = compare(I, a, T, dt, thetas);
    const [firstRun] = dataset.runs.values();
    if (firstRun.T !== firstRun.requestedT) {
      log.warn(`realized horizon T=${firstRun.T} differs from requested T=${T} (Nt=${firstRun.Nt}, dt=${dt})`);
    }
    out(formatErrorTable(errorTable(dataset)));

    if (dts) {
      for (const theta of dataset.runs.keys()) {
        out('');
        out(formatConvergence(convergenceRates(I, a, T, theta, dts)));
      }
    }
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      log.error(`invalid ${error.parameter}: ${error.message}`);
      return 1;
    }
    throw error;
  }

  return 0;
};
