// ical-expander ships no type definitions; only the surface used here is declared.
declare module 'ical-expander' {
  export interface IcalTimezone {
    tzid: string
  }

  export interface IcalDuration {
    toSeconds(): number
  }

  export interface IcalTime {
    year: number
    month: number
    day: number
    hour: number
    minute: number
    second: number
    isDate: boolean
    zone: IcalTimezone | null
    clone(): IcalTime
    addDuration(duration: IcalDuration): void
  }

  export interface IcalProperty {
    getParameter(name: string): unknown
    getFirstValue(): unknown
  }

  export interface IcalComponent {
    getAllSubcomponents(name?: string): IcalComponent[]
    getFirstProperty(name: string): IcalProperty | null
    getFirstPropertyValue(name: string): unknown
  }

  export interface IcalExpanderOptions {
    ics: string
    maxIterations?: number
    skipInvalidDates?: boolean
  }

  export default class IcalExpander {
    constructor(options: IcalExpanderOptions)
    component: IcalComponent
  }
}
