/**
 * Markup builders for the site pages the engine reads. Only the structure the
 * extractors depend on is reproduced.
 */

export interface HistoryFixtureItem {
  id: number
  title: string
  originalTitle?: string
  /** e.g. "Сезон 1. Эпизод 2"; omitted for movies */
  badge?: string
}

export interface HistoryFixtureDay {
  /** e.g. "10 Май" */
  header: string
  year: number
  items: HistoryFixtureItem[]
}

function pagination(totalPages: number | undefined, path: string): string {
  if (!totalPages || totalPages <= 1) {
    return ""
  }
  return `<ul class="pagination"><li class="first"><a href="${path}?page=1">«</a></li><li class="last"><a href="${path}?page=${totalPages}&amp;per-page=50">»</a></li></ul>`
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body><a href="/user/logout">Выход</a>${body}</body></html>`
}

export function historyPageHtml(days: HistoryFixtureDay[], totalPages?: number): string {
  const content = days
    .map((day) => {
      const blocks = day.items
        .map((item) => {
          const badge = item.badge
            ? `<div class="topleft-2x"><span class="label label-success">${item.badge}</span></div>`
            : ""
          const author = item.originalTitle
            ? `<div class="item-author"><a href="/item/search?author">${item.originalTitle}</a></div>`
            : ""
          return `<div class="col-md-3">${badge}<div class="item-title"><a href="/item/view/${item.id}">${item.title}</a></div>${author}</div>`
        })
        .join("")
      return `<h4>${day.header} <small>${day.year}</small></h4>${blocks}`
    })
    .join("")

  return layout(
    "История просмотров",
    `<div class="item-list">${content}</div>${pagination(totalPages, "/history/index/viewer/episodes")}`
  )
}

export function proRequiredPageHtml(): string {
  return layout("История", `<div class="alert">Для доступа к этой странице нужен PRO-аккаунт</div>`)
}

export interface CatalogFixtureItem {
  id: number
  title: string
  originalTitle?: string
}

export function catalogPageHtml(items: CatalogFixtureItem[], totalPages?: number): string {
  const blocks = items
    .map((item) => {
      const author = item.originalTitle
        ? `<div class="item-author"><a href="#">${item.originalTitle}</a></div>`
        : ""
      return `<div class="col-xs-4"><div class="item-poster"><a href="/item/view/${item.id}/Slug"><img src="/p.jpg"></a></div><div class="item-title"><a href="/item/view/${item.id}">${item.title}</a></div>${author}</div>`
    })
    .join("")
  return layout("Каталог", `<div class="row" id="items">${blocks}</div>${pagination(totalPages, "/movie")}`)
}

export interface NewEpisodeFixtureRow {
  showId: number
  season: number
  episode: number
  title: string
  originalTitle?: string
  /** Link in a nested anchor instead of the row's onclick handler */
  anchorOnly?: boolean
}

export function newEpisodesPageHtml(rows: NewEpisodeFixtureRow[], totalPages?: number): string {
  const body = rows
    .map((row) => {
      const path = `/item/view/${row.showId}/s${row.season}e${row.episode}/Episode`
      const onclick = row.anchorOnly ? "" : ` onclick="document.location='${path}'"`
      const link = row.anchorOnly ? `<a href="${path}">open</a>` : ""
      const original = row.originalTitle ? `<br>${row.originalTitle}` : ""
      return `<tr${onclick}><td>${link}<img src="/p.jpg"></td><td><b>${row.title}</b>${original}</td><td>s${row.season}e${row.episode}</td></tr>`
    })
    .join("")
  return layout(
    "Новые эпизоды",
    `<table class="table"><thead><tr><th></th><th>Название</th><th></th></tr></thead><tbody>${body}</tbody></table>${pagination(totalPages, "/media/new-serial-episodes")}`
  )
}

export interface ShowPageFixture {
  heading?: string
  year?: number
  typeKey?: string
  status?: string
  kinopoisk?: { href: string; rating: string; votes?: string }
  imdb?: { href: string; rating: string; votes?: string }
  countries?: string[]
  genres?: string[]
  creators?: string[]
  directors?: string[]
  actors?: string[]
  /** Leave out the info table entirely */
  noTable?: boolean
}

function linkRow(label: string, names: string[] | undefined): string {
  if (!names || names.length === 0) {
    return ""
  }
  const links = names.map((name) => `<a href="/item/search?q=${encodeURIComponent(name)}">${name}</a>`).join(", ")
  return `<tr><td><strong>${label}</strong></td><td>${links}</td></tr>`
}

function ratingLink(rating: { href: string; rating: string; votes?: string } | undefined): string {
  if (!rating) {
    return ""
  }
  const votes = rating.votes ? ` <small>(${rating.votes})</small>` : ""
  return `<a href="${rating.href}">${rating.rating}</a>${votes} `
}

export function showPageHtml(show: ShowPageFixture): string {
  const heading = show.heading ? `<h3>${show.heading}</h3>` : ""
  if (show.noTable) {
    return layout(show.heading ?? "Item", heading)
  }

  const rows = [
    show.year !== undefined
      ? `<tr><td><strong>Год выхода</strong></td><td><a href="/${show.typeKey ?? "movie"}?years=${show.year}">${show.year}</a></td></tr>`
      : "",
    show.status ? `<tr><td><strong>Статус</strong></td><td>${show.status}</td></tr>` : "",
    show.kinopoisk || show.imdb
      ? `<tr><td><strong>Рейтинг</strong></td><td>${ratingLink(show.kinopoisk)}${ratingLink(show.imdb)}</td></tr>`
      : "",
    linkRow("Страна", show.countries),
    linkRow("Жанр", show.genres),
    linkRow("Создатель", show.creators),
    linkRow("Режиссёр", show.directors),
    linkRow("В ролях", show.actors),
  ].join("")

  return layout(
    show.heading ?? "Item",
    `${heading}<table class="table table-striped"><tbody>${rows}</tbody></table>`
  )
}

export interface PlaylistFixtureEntry {
  season?: number
  episode?: number
  duration?: number
}

export function playerPageHtml(playlist: PlaylistFixtureEntry[], seasons?: number[]): string {
  const seasonsScript = seasons
    ? `window.PLAYER_SEASONS = ${JSON.stringify(seasons.map((season) => ({ season, title: `Сезон ${season}` })))};`
    : ""
  return layout(
    "Плеер",
    `<script>window.PLAYER_ITEM_ID = 1;\nwindow.PLAYER_PLAYLIST = ${JSON.stringify(playlist)};\n${seasonsScript}</script>`
  )
}

export function challengePageHtml(): string {
  return `<!DOCTYPE html><html><head><title>Just a moment...</title></head><body><script src="https://challenges.cloudflare.com/turnstile/v0/api.js"></script></body></html>`
}

export function loginPageHtml(): string {
  return `<!DOCTYPE html><html><head><title>Авторизация</title></head><body><h3>Авторизация</h3><form id="login-form"><input id="login-form-login"><input id="login-form-password"><button type="submit">Войти</button></form></body></html>`
}

export function notFoundPageHtml(): string {
  return `<!DOCTYPE html><html><head><title>404 Not Found</title></head><body><h1>Not Found</h1></body></html>`
}
