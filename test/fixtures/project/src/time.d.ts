declare module "time" {
	export type Duration = number & { readonly __unit: "ns" };
	export function Duration(value: number): Duration;
	export const Millisecond: Duration;
	export const Second: Duration;
}
