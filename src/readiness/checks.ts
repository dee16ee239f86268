/**
 * Individual readiness checks. Each one reads the settings snapshot and
 * returns the message block to print, or null when it has nothing to say.
 */
import type { MessageStyle } from "../shared/colors.js";
import type { Settings } from "../settings/schema.js";

export interface Message {
  style: MessageStyle;
  text: string;
}

export type Check = (settings: Settings) => Message | null;

export const TARGET_DOMAIN = "zentoerp.com";
export const SUBDOMAIN_WILDCARD = `*.${TARGET_DOMAIN}`;
export const EXPECTED_TENANT_MODEL = "tenants.Tenant";
/** Prefix the framework puts on generated development keys */
export const INSECURE_KEY_MARKER = "django-insecure";

const BANNER_WIDTH = 60;

export function bannerMessage(): Message {
  return {
    style: "success",
    text: `🎯 Verificando configuración para producción en Render\n${"=".repeat(BANNER_WIDTH)}`,
  };
}

export function checkDebug(settings: Settings): Message | null {
  if (!settings.DEBUG) return null;
  return {
    style: "warning",
    text:
      "⚠️  Ejecutando en modo DEBUG (desarrollo)\n" +
      "   En producción, Render configurará DEBUG=False automáticamente",
  };
}

export function checkSecretKey(settings: Settings): Message | null {
  if (!settings.SECRET_KEY.includes(INSECURE_KEY_MARKER)) return null;
  return {
    style: "warning",
    text:
      "⚠️  SECRET_KEY de desarrollo detectada\n" +
      "   En producción, configurar SECRET_KEY segura en variables de entorno",
  };
}

export function checkTenantDomain(settings: Settings): Message {
  if (settings.TENANT_DOMAIN !== undefined) {
    return { style: "success", text: `✅ TENANT_DOMAIN configurado: ${settings.TENANT_DOMAIN}` };
  }
  return { style: "error", text: "❌ TENANT_DOMAIN no configurado" };
}

export function checkAllowedHosts(settings: Settings): Message {
  if (settings.ALLOWED_HOSTS.includes(SUBDOMAIN_WILDCARD)) {
    return { style: "success", text: `✅ ALLOWED_HOSTS incluye ${SUBDOMAIN_WILDCARD}` };
  }
  return { style: "error", text: `❌ ALLOWED_HOSTS no incluye ${SUBDOMAIN_WILDCARD}` };
}

// No error branch: a missing or different tenant model prints nothing.
export function checkTenantModel(settings: Settings): Message | null {
  if (settings.TENANT_MODEL !== EXPECTED_TENANT_MODEL) return null;
  return { style: "success", text: "✅ Modelos de tenant configurados correctamente" };
}

export function summaryMessage(settings: Settings): Message {
  const tenantModel = settings.TENANT_MODEL ?? "No configurado";
  const lines = [
    "",
    "🎉 Configuración base lista para producción!",
    `   Dominio objetivo: ${TARGET_DOMAIN}`,
    `   Subdominios: ${SUBDOMAIN_WILDCARD}`,
    `   Modelo tenant: ${tenantModel}`,
    "",
    "📋 Pasos para producción:",
    "   1. Crear servicios en Render (PostgreSQL, Redis, Web)",
    "   2. Configurar variables de entorno en Render",
    "   3. Configurar DNS (A record + CNAME *)",
    "   4. Deploy automático desde branch production",
    "",
    "🔧 Variables críticas para Render:",
    "   - SECRET_KEY: Generar clave segura",
    "   - DEBUG: False",
    `   - ALLOWED_HOSTS: ${TARGET_DOMAIN},${SUBDOMAIN_WILDCARD}`,
    "   - DB_* : Credenciales de PostgreSQL",
    "   - REDIS_URL: URL de Redis",
  ];
  return { style: "success", text: `${lines.join("\n")}\n` };
}

/** Conditional checks, in report order. The banner and summary frame them. */
export const READINESS_CHECKS: ReadonlyArray<{ name: string; run: Check }> = [
  { name: "debug", run: checkDebug },
  { name: "secret_key", run: checkSecretKey },
  { name: "tenant_domain", run: checkTenantDomain },
  { name: "allowed_hosts", run: checkAllowedHosts },
  { name: "tenant_model", run: checkTenantModel },
];
