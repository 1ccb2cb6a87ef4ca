declare module 'ode45-cash-karp' {
  namespace ode45 {
    type Derivative = (dydt: number[], y: number[], t: number) => void

    interface Options {
      tol?: number
      maxIncreaseFactor?: number
      maxDecreaseFactor?: number
      dtMinMag?: number
      dtMaxMag?: number
      errorScaleFunction?: (i: number, dt: number, y: number, dydt: number) => number
      verbose?: boolean
    }

    interface Integrator {
      y: number[]
      t: number
      dt: number
      step(tLimit?: number): boolean
    }
  }

  function ode45(y0: number[], deriv: ode45.Derivative, t0: number, dt0: number, options?: ode45.Options): ode45.Integrator

  export = ode45
}
